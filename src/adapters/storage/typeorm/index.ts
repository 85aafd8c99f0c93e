/**
 * TypeORM adapters for PostgreSQL
 */

export { TypeORMOrderStore } from './typeorm-order-store.adapter';
export {
  TypeORMSettingsSource,
  PAYMENT_SETTINGS_KEY,
} from './typeorm-settings.source';
export { createDataSource, createTypeORMConfig } from './typeorm.config';
export * from './entities';
