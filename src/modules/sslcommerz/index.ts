export * from './sslcommerz.module';
export * from './sslcommerz.config';
export * from './constants';
export * from './services';
export * from './controllers';
