import { SettingsSource } from '../../core';

/**
 * Settings source backed by a value held in memory
 * Used when credentials come from environment configuration
 */
export class StaticSettingsSource implements SettingsSource {
  constructor(private settings: unknown) {}

  async loadPaymentSettings(): Promise<unknown> {
    return this.settings;
  }

  update(settings: unknown): void {
    this.settings = settings;
  }
}
