export * from './storage/mock';
export * from './storage/typeorm';
export * from './settings';
