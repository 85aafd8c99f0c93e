import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  resolveCredentials,
  type CallbackProcessor,
  type OrderStore,
  type SettingsSource,
} from '../../../core';
import {
  CALLBACK_PROCESSOR,
  ORDER_STORE,
  SETTINGS_SOURCE,
} from '../constants';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
} from '../../../_shared/swagger/decorators';
import { ConfigurationService } from '../services/configuration.service';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(ORDER_STORE)
    private readonly orderStore: OrderStore,
    @Inject(SETTINGS_SOURCE)
    private readonly settingsSource: SettingsSource,
    @Inject(CALLBACK_PROCESSOR)
    private readonly callbackProcessor: CallbackProcessor,
    private readonly configurationService: ConfigurationService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<{
    status: string;
    environment: string;
    timestamp: Date;
    uptime: number;
  }> {
    return {
      status: 'healthy',
      environment: this.configurationService.getEnvironment(),
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<{
    status: string;
    checks: {
      orderStore: boolean;
      gatewayConfigured: boolean;
    };
    details: {
      pipeline: ReturnType<CallbackProcessor['getStatistics']>;
    };
  }> {
    const pipeline = this.callbackProcessor.getStatistics();
    const orderStoreHealthy = await this.orderStore.isHealthy();
    const gatewayConfigured = await this.isGatewayConfigured(
      pipeline.configuration.gatewayName,
    );

    return {
      status: orderStoreHealthy && gatewayConfigured ? 'ready' : 'not_ready',
      checks: {
        orderStore: orderStoreHealthy,
        gatewayConfigured,
      },
      details: { pipeline },
    };
  }

  private async isGatewayConfigured(gatewayName: string): Promise<boolean> {
    try {
      const raw = await this.settingsSource.loadPaymentSettings();
      return resolveCredentials(raw, gatewayName).kind === 'resolved';
    } catch {
      return false;
    }
  }
}
