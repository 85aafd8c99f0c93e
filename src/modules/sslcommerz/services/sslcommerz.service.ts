import { Injectable, Inject, Logger } from '@nestjs/common';
import {
  resolveCredentials,
  type CallbackProcessor,
  type CallbackRequest,
  type CallbackResult,
  type CheckoutRequest,
  type SessionResult,
  type SettingsSource,
  type SslcommerzSessionClient,
  InitiationError,
} from '../../../core';
import {
  CALLBACK_PROCESSOR,
  SESSION_CLIENT,
  SETTINGS_SOURCE,
} from '../constants';
import { ConfigurationService } from './configuration.service';

/**
 * SslcommerzService
 *
 * High-level operations used by the controllers and by host code
 */
@Injectable()
export class SslcommerzService {
  private readonly logger = new Logger(SslcommerzService.name);

  constructor(
    @Inject(CALLBACK_PROCESSOR)
    private readonly callbackProcessor: CallbackProcessor,
    @Inject(SESSION_CLIENT)
    private readonly sessionClient: SslcommerzSessionClient,
    @Inject(SETTINGS_SOURCE)
    private readonly settingsSource: SettingsSource,
    private readonly configurationService: ConfigurationService,
  ) {}

  /**
   * Process a redirect-back landing or IPN delivery
   */
  async handleCallback(request: CallbackRequest): Promise<CallbackResult> {
    return this.callbackProcessor.process(request);
  }

  /**
   * Create a hosted checkout session for an order
   */
  async createCheckout(request: CheckoutRequest): Promise<SessionResult> {
    const urls = this.configurationService.getCheckoutUrls();
    if (!urls) {
      throw new InitiationError('Checkout URLs are not configured');
    }

    const resolution = resolveCredentials(
      await this.settingsSource.loadPaymentSettings(),
      this.configurationService.getGatewayName(),
    );
    if (resolution.kind !== 'resolved') {
      this.logger.warn(`Checkout for order ${request.orderId}: gateway not configured`);
      throw new InitiationError('Payment gateway is not configured');
    }

    return this.sessionClient.createSession(
      request,
      resolution.credentials,
      urls,
    );
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): ReturnType<CallbackProcessor['getStatistics']> {
    return this.callbackProcessor.getStatistics();
  }
}
