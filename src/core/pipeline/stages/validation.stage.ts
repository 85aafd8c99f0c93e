import { SslcommerzValidationClient } from '../../validation/validation-client';
import { CallbackContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 5: Validation API round-trip
 */
export class ValidationStage implements PipelineStage {
  name = 'validation';

  constructor(private readonly validationClient: SslcommerzValidationClient) {}

  async execute(context: CallbackContext): Promise<StageResult> {
    if (!context.notification || !context.credentials) {
      return {
        kind: 'error',
        error: new Error('Validation requires a notification and credentials'),
        context,
      };
    }

    context.validation = await this.validationClient.validate(
      context.notification,
      context.credentials,
      { hashVerified: context.hashVerified },
    );

    return {
      kind: 'continue',
      context,
      metadata: {
        confirmed: context.validation.confirmed,
        status: context.validation.status,
      },
    };
  }
}
