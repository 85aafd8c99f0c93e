import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
  Query,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  CallbackOutcome,
  type CallbackProcessor,
  type CallbackResult,
} from '../../../core';
import {
  ApiCallbackEndpoint,
  ApiIpnEndpoint,
  CallbackQueryDto,
  CallbackResponseDto,
} from '../../../_shared';
import { CALLBACK_PROCESSOR } from '../constants';
import { ConfigurationService } from '../services/configuration.service';

const OUTCOME_MESSAGES: Record<CallbackOutcome, string> = {
  [CallbackOutcome.RECONCILED]: 'Payment validated and applied to the order',
  [CallbackOutcome.NOT_APPLICABLE]: 'Landing does not require processing',
  [CallbackOutcome.INVALID_INPUT]: 'Notification is missing a transaction or order id',
  [CallbackOutcome.UNCONFIGURED]: 'Payment gateway is not configured',
  [CallbackOutcome.VALIDATION_FAILED]: 'Payment could not be validated',
  [CallbackOutcome.ORDER_NOT_FOUND]: 'Payment validated but the order does not exist',
  [CallbackOutcome.REJECTION_RECORDED]: 'Failed or cancelled payment recorded on the order',
  [CallbackOutcome.ERROR]: 'Notification could not be processed',
};

/**
 * Callback Controller
 *
 * Receives the payer's redirect-back and the gateway's IPN.
 * Always answers 200; the outcome says what happened.
 */
@ApiTags('Callbacks')
@Controller('sslcommerz')
export class CallbackController {
  private readonly logger = new Logger(CallbackController.name);

  constructor(
    @Inject(CALLBACK_PROCESSOR)
    private readonly callbackProcessor: CallbackProcessor,
    private readonly configurationService: ConfigurationService,
  ) {}

  @Post('callback')
  @HttpCode(HttpStatus.OK)
  @ApiCallbackEndpoint()
  async handleCallback(
    @Query() query: CallbackQueryDto,
    @Body() body: unknown,
  ): Promise<CallbackResponseDto> {
    const result = await this.callbackProcessor.process({
      channel: 'landing',
      landingMode: query.order_placement,
      payload: body,
    });
    return this.formatResponse(result);
  }

  @Post('ipn')
  @HttpCode(HttpStatus.OK)
  @ApiIpnEndpoint()
  async handleIpn(@Body() body: unknown): Promise<CallbackResponseDto> {
    this.logger.log('Received IPN');

    const result = await this.callbackProcessor.process({
      channel: 'ipn',
      payload: body,
    });
    return this.formatResponse(result);
  }

  private formatResponse(result: CallbackResult): CallbackResponseDto {
    const response: CallbackResponseDto = {
      outcome: result.outcome,
      message: OUTCOME_MESSAGES[result.outcome],
      processingId: result.processingId,
    };
    // Internal reasons stay in the logs unless debugging
    if (this.configurationService.isDebugMode() && result.reason) {
      response.reason = result.reason;
    }
    return response;
  }
}
