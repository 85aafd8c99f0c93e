export * from './session-client';
