import { Injectable, Inject } from '@nestjs/common';
import type { SslcommerzModuleConfig } from '../sslcommerz.config';
import { SSLCOMMERZ_CONFIG } from '../constants';
import type { CheckoutUrls } from '../../../core';

/**
 * Configuration Service
 *
 * Provides access to the module configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(SSLCOMMERZ_CONFIG)
    private readonly config: SslcommerzModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): SslcommerzModuleConfig {
    return this.config;
  }

  getGatewayName(): string {
    return this.config.gateway?.name || 'sslcommerz';
  }

  /**
   * Return URLs for session creation; null until all three are configured
   */
  getCheckoutUrls(): CheckoutUrls | null {
    const { successUrl, cancelUrl, ipnUrl } = this.config.urls ?? {};
    if (!successUrl || !cancelUrl || !ipnUrl) {
      return null;
    }
    return { successUrl, cancelUrl, ipnUrl };
  }

  /**
   * Check if debug mode is enabled
   */
  isDebugMode(): boolean {
    return this.config.debug === true;
  }

  /**
   * Get environment
   */
  getEnvironment(): string {
    return this.config.environment || 'development';
  }
}
