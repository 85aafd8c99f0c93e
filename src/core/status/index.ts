export * from './status-mapper';
