/**
 * SSLCommerz Order Bridge
 *
 * Validates gateway callbacks and reconciles the result onto host orders,
 * and creates hosted checkout sessions.
 */
import 'reflect-metadata';

// Export all core components
export * from './core';

// Export testing utilities from _shared
export {
  MockNotificationFactory,
  TEST_STORE_ID,
  TEST_STORE_PASSWORD,
} from './_shared/testing/mock-notification-factory';
export type {
  NotificationOptions,
  NotificationFixture,
} from './_shared/testing/mock-notification-factory';
export {
  createStubHttp,
  createFailingHttp,
} from './_shared/testing/stub-http';
export type { StubHandler, StubResponse } from './_shared/testing/stub-http';

// Export adapters
export * from './adapters';

// Export NestJS module, services and controllers
export * from './modules';

// Export DTOs
export * from './_shared/dto';
