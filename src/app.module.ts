import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SslcommerzModule, SslcommerzModuleConfig } from './modules';

/**
 * Build the module configuration from environment variables
 */
export function configFromEnvironment(
  configService: ConfigService,
): SslcommerzModuleConfig {
  const storageType =
    configService.get<string>('STORAGE_TYPE') === 'typeorm'
      ? 'typeorm'
      : 'memory';

  const environment = configService.get<string>('SSLCOMMERZ_ENVIRONMENT');
  const storeId = configService.get<string>('SSLCOMMERZ_STORE_ID');
  const storePassword = configService.get<string>('SSLCOMMERZ_STORE_PASSWORD');

  const dbPort = configService.get<string>('DB_PORT');

  return {
    storage: {
      type: storageType,
      options: {
        host: configService.get<string>('DB_HOST', 'localhost'),
        port: dbPort ? parseInt(dbPort, 10) : 5432,
        username: configService.get<string>('DB_USERNAME', 'orders'),
        password: configService.get<string>('DB_PASSWORD', 'orders'),
        database: configService.get<string>('DB_NAME', 'orders'),
      },
    },
    // Without all three, credentials come from the persisted settings row
    ...(environment && storeId && storePassword
      ? { gateway: { credentials: { environment, storeId, storePassword } } }
      : {}),
    urls: {
      successUrl: configService.get<string>('SSLCOMMERZ_SUCCESS_URL'),
      cancelUrl: configService.get<string>('SSLCOMMERZ_CANCEL_URL'),
      ipnUrl: configService.get<string>('SSLCOMMERZ_IPN_URL'),
    },
    callbacks: {
      writeBackRejections:
        configService.get<string>('SSLCOMMERZ_WRITE_BACK_REJECTIONS') ===
        'true',
    },
    environment:
      configService.get<string>('NODE_ENV') === 'production'
        ? 'production'
        : 'development',
    debug: configService.get<string>('SSLCOMMERZ_DEBUG') === 'true',
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    SslcommerzModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        configFromEnvironment(configService),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
