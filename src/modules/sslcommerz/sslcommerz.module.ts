import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  SslcommerzModuleConfig,
  SslcommerzModuleAsyncConfig,
  mergeSslcommerzConfig,
} from './sslcommerz.config';
import {
  CallbackProcessor,
  OrderStore,
  SettingsSource,
  SslcommerzSessionClient,
  SslcommerzValidationClient,
} from '../../core';
import {
  MockOrderStore,
  StaticSettingsSource,
  TypeORMOrderStore,
  TypeORMSettingsSource,
  createDataSource,
} from '../../adapters';
import {
  CALLBACK_PROCESSOR,
  DATA_SOURCE,
  ORDER_STORE,
  SESSION_CLIENT,
  SETTINGS_SOURCE,
  SSLCOMMERZ_CONFIG,
  VALIDATION_CLIENT,
} from './constants';
import { CallbackController } from './controllers/callback.controller';
import { CheckoutController } from './controllers/checkout.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';
import { SslcommerzService } from './services/sslcommerz.service';

const controllers = [CallbackController, CheckoutController, HealthController];

const exportedTokens = [
  SSLCOMMERZ_CONFIG,
  ORDER_STORE,
  SETTINGS_SOURCE,
  CALLBACK_PROCESSOR,
  SslcommerzService,
];

/**
 * SSLCommerz Module - Main NestJS Module
 *
 * Wires storage, settings, gateway clients and the callback pipeline
 */
@Global()
@Module({})
export class SslcommerzModule {
  /**
   * Configure the module synchronously
   */
  static forRoot(config: SslcommerzModuleConfig): DynamicModule {
    return {
      module: SslcommerzModule,
      providers: [
        {
          provide: SSLCOMMERZ_CONFIG,
          useValue: mergeSslcommerzConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers,
      exports: exportedTokens,
    };
  }

  /**
   * Configure the module asynchronously
   */
  static forRootAsync(options: SslcommerzModuleAsyncConfig): DynamicModule {
    return {
      module: SslcommerzModule,
      imports: options.imports || [],
      providers: [
        {
          provide: SSLCOMMERZ_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeSslcommerzConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers,
      exports: exportedTokens,
    };
  }

  /**
   * Providers shared by both registration styles; all read the merged config
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: DATA_SOURCE,
        useFactory: async (
          config: SslcommerzModuleConfig,
        ): Promise<DataSource | null> => {
          if (config.storage.type !== 'typeorm') {
            return null;
          }
          const dataSource = createDataSource(config.storage.options);
          await dataSource.initialize();
          return dataSource;
        },
        inject: [SSLCOMMERZ_CONFIG],
      },
      {
        provide: ORDER_STORE,
        useFactory: (
          config: SslcommerzModuleConfig,
          dataSource: DataSource | null,
        ): OrderStore => {
          switch (config.storage.type) {
            case 'memory':
              return new MockOrderStore();

            case 'typeorm':
              if (!dataSource) {
                throw new Error('TypeORM data source not initialized');
              }
              return new TypeORMOrderStore(dataSource);

            case 'custom':
              if (!config.storage.orderStore) {
                throw new Error('Custom order store not provided');
              }
              return config.storage.orderStore;
          }
        },
        inject: [SSLCOMMERZ_CONFIG, DATA_SOURCE],
      },
      {
        provide: SETTINGS_SOURCE,
        useFactory: (
          config: SslcommerzModuleConfig,
          dataSource: DataSource | null,
        ): SettingsSource => {
          if (config.storage.settingsSource) {
            return config.storage.settingsSource;
          }

          const credentials = config.gateway?.credentials;
          if (credentials) {
            return new StaticSettingsSource({
              environment: credentials.environment,
              store_id: credentials.storeId,
              store_password: credentials.storePassword,
            });
          }

          if (dataSource) {
            return new TypeORMSettingsSource(dataSource);
          }

          // Nothing configured: every delivery resolves as unconfigured
          return new StaticSettingsSource(null);
        },
        inject: [SSLCOMMERZ_CONFIG, DATA_SOURCE],
      },
      {
        provide: VALIDATION_CLIENT,
        useFactory: (config: SslcommerzModuleConfig) =>
          new SslcommerzValidationClient({
            http: config.gateway?.http,
            timeoutMs: config.gateway?.validationTimeoutMs,
          }),
        inject: [SSLCOMMERZ_CONFIG],
      },
      {
        provide: SESSION_CLIENT,
        useFactory: (config: SslcommerzModuleConfig) =>
          new SslcommerzSessionClient({
            http: config.gateway?.http,
            timeoutMs: config.gateway?.sessionTimeoutMs,
            transactionPrefix: config.gateway?.transactionPrefix,
          }),
        inject: [SSLCOMMERZ_CONFIG],
      },
      {
        provide: CALLBACK_PROCESSOR,
        useFactory: (
          config: SslcommerzModuleConfig,
          orderStore: OrderStore,
          settingsSource: SettingsSource,
          validationClient: SslcommerzValidationClient,
        ) =>
          new CallbackProcessor({
            orderStore,
            settingsSource,
            validationClient,
            gatewayName: config.gateway?.name,
            successMarker: config.callbacks?.successMarker,
            writeBackRejections: config.callbacks?.writeBackRejections,
            hooks: config.hooks,
          }),
        inject: [
          SSLCOMMERZ_CONFIG,
          ORDER_STORE,
          SETTINGS_SOURCE,
          VALIDATION_CLIENT,
        ],
      },
      ConfigurationService,
      SslcommerzService,
    ];
  }
}
