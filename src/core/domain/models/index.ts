export * from './order.model';
