import { CallbackOutcome } from '../../domain/enums';
import { CallbackContext, PipelineStage, StageResult } from '../types';

export const DEFAULT_SUCCESS_MARKER = 'success';

/**
 * Stage 1: Landing filter
 * Only the success landing (and IPN, which has no landing flag) proceeds
 */
export class LandingFilterStage implements PipelineStage {
  name = 'landing-filter';

  constructor(private readonly successMarker = DEFAULT_SUCCESS_MARKER) {}

  async execute(context: CallbackContext): Promise<StageResult> {
    if (context.channel === 'ipn' || context.landingMode === this.successMarker) {
      return { kind: 'continue', context };
    }

    return {
      kind: 'skip',
      outcome: CallbackOutcome.NOT_APPLICABLE,
      reason: `Landing mode '${context.landingMode ?? ''}' is not handled`,
      context,
    };
  }
}
