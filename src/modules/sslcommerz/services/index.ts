export * from './configuration.service';
export * from './sslcommerz.service';
