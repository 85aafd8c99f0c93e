export * from './order.entity';
export * from './setting.entity';
