export * from './validation-client';
