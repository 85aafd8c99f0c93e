// Interface and type exports
export * from './common.types';
export * from './order-store.adapter';
export * from './settings-source.interface';
