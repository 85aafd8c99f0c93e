export * from './mock-order-store.adapter';
