export * from './payment-status.enum';
export * from './order-status.enum';
export * from './processor-status.enum';
export * from './gateway-environment.enum';
export * from './callback-outcome.enum';
