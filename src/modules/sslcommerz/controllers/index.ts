export * from './callback.controller';
export * from './checkout.controller';
export * from './health.controller';
