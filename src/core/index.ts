/**
 * SSLCommerz bridge core - protocol logic with no framework wiring
 * Storage and settings sources are reached through interfaces only
 */

// Domain
export * from './domain/models';
export * from './domain/enums';
export * from './domain/value-objects/client-credentials.vo';

// Interfaces and contracts
export * from './interfaces';

// Protocol components
export * from './notification';
export * from './verification';
export * from './http';
export * from './validation';
export * from './status';
export * from './reconciliation';
export * from './settings';
export * from './initiation';

// Callback processing pipeline
export * from './pipeline';
