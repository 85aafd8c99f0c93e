import { verifyNotificationHash } from '../../verification/hash-verifier';
import { CallbackContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 4: Hash verification
 * Records the result only; the validation stage acts on it
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';

  async execute(context: CallbackContext): Promise<StageResult> {
    if (!context.notification || !context.credentials) {
      return {
        kind: 'error',
        error: new Error('Verification requires a notification and credentials'),
        context,
      };
    }

    context.hashVerified = verifyNotificationHash(
      context.notification,
      context.credentials.storePassword,
    );

    return {
      kind: 'continue',
      context,
      metadata: { hashVerified: context.hashVerified },
    };
  }
}
