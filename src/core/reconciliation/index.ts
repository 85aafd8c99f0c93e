export * from './order-reconciler';
export * from './settlement';
