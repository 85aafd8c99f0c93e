/**
 * DTOs for the HTTP API
 *
 * Input validation and Swagger documentation for all endpoints
 */

export * from './callback.dto';
export * from './checkout.dto';
