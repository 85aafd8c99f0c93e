import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { AxiosInstance } from 'axios';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import type {
  CallbackHooks,
  OrderStore,
  SettingsSource,
} from '../../core';

/**
 * SSLCommerz Module Configuration
 */
export interface SslcommerzModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'memory' | 'typeorm' | 'custom';
    options?: Partial<PostgresConnectionOptions>;
    orderStore?: OrderStore;
    settingsSource?: SettingsSource;
  };

  /**
   * Gateway configuration
   */
  gateway?: {
    /**
     * Payment method name in the persisted settings blob
     * Default: 'sslcommerz'
     */
    name?: string;

    /**
     * Credentials supplied directly (e.g. from the environment).
     * When absent, credentials are read from the settings source on
     * every delivery.
     */
    credentials?: {
      environment: string;
      storeId: string;
      storePassword: string;
    };

    /**
     * Timeout for validation API calls in milliseconds
     * Default: 30000
     */
    validationTimeoutMs?: number;

    /**
     * Timeout for session creation in milliseconds
     * Default: 60000
     */
    sessionTimeoutMs?: number;

    /**
     * Prefix for generated transaction ids
     * Default: 'ORDER-'
     */
    transactionPrefix?: string;

    /**
     * HTTP client override; tests pass an instance with a stub adapter
     */
    http?: AxiosInstance;
  };

  /**
   * Return and notification URLs sent when creating a session
   */
  urls?: {
    successUrl?: string;
    cancelUrl?: string;
    ipnUrl?: string;
  };

  /**
   * Callback processing configuration
   */
  callbacks?: {
    /**
     * order_placement value of the success landing
     */
    successMarker?: string;

    /**
     * Write processor-confirmed FAILED / CANCELLED results to the order.
     * Off by default; a paid order is never overwritten.
     */
    writeBackRejections?: boolean;
  };

  /**
   * Lifecycle hooks
   */
  hooks?: CallbackHooks;

  /**
   * Environment-specific settings
   */
  environment?: 'development' | 'staging' | 'production';
  debug?: boolean;
}

/**
 * Async configuration factory
 */
export interface SslcommerzModuleAsyncConfig
  extends Pick<ModuleMetadata, 'imports'>,
    Pick<
      FactoryProvider<SslcommerzModuleConfig | Promise<SslcommerzModuleConfig>>,
      'useFactory' | 'inject'
    > {}

/**
 * Default configuration values
 */
export const defaultSslcommerzConfig: Omit<SslcommerzModuleConfig, 'storage'> =
  {
    gateway: {
      name: 'sslcommerz',
      validationTimeoutMs: 30000,
      sessionTimeoutMs: 60000,
      transactionPrefix: 'ORDER-',
    },
    urls: {},
    callbacks: {
      successMarker: 'success',
      writeBackRejections: false,
    },
    environment: 'development',
    debug: false,
  };

/**
 * Merge user configuration over the defaults, one level deep
 */
export function mergeSslcommerzConfig(
  config: SslcommerzModuleConfig,
): SslcommerzModuleConfig {
  return {
    ...defaultSslcommerzConfig,
    ...config,
    gateway: { ...defaultSslcommerzConfig.gateway, ...config.gateway },
    urls: { ...defaultSslcommerzConfig.urls, ...config.urls },
    callbacks: { ...defaultSslcommerzConfig.callbacks, ...config.callbacks },
  };
}
