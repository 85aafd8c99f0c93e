import { DataSource, Repository } from 'typeorm';
import { SettingsSource } from '../../../core';
import { SettingEntity } from './entities';

export const PAYMENT_SETTINGS_KEY = 'payment_settings';

/**
 * Reads the persisted payment settings row
 * The raw value is returned; parsing happens in the credentials resolver
 */
export class TypeORMSettingsSource implements SettingsSource {
  private settingRepo: Repository<SettingEntity>;

  constructor(
    dataSource: DataSource,
    private readonly settingName: string = PAYMENT_SETTINGS_KEY,
  ) {
    this.settingRepo = dataSource.getRepository(SettingEntity);
  }

  async loadPaymentSettings(): Promise<unknown> {
    const row = await this.settingRepo.findOne({
      where: { name: this.settingName },
    });
    return row?.value ?? null;
  }
}
