/**
 * NestJS integration for the SSLCommerz order bridge
 */

export * from './sslcommerz';
