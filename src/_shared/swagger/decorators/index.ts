/**
 * Swagger decorators for the HTTP API
 *
 * Keep endpoint documentation out of the controllers
 */

export * from './callback.decorators';
export * from './checkout.decorators';
export * from './health.decorators';
