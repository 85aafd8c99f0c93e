export * from './inbound-notification';
