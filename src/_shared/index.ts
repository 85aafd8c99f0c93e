/**
 * Shared resources
 *
 * DTOs, Swagger decorators and testing utilities used across the application
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger/decorators';

// Testing utilities
export * from './testing/mock-notification-factory';
export * from './testing/stub-http';
