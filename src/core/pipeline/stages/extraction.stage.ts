import { CallbackOutcome } from '../../domain/enums';
import {
  extractNotification,
  parseOrderId,
  readField,
} from '../../notification/inbound-notification';
import { CallbackContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 2: Extraction
 * Sanitizes the body and pulls out the transaction and order ids
 */
export class ExtractionStage implements PipelineStage {
  name = 'extraction';

  async execute(context: CallbackContext): Promise<StageResult> {
    const notification = extractNotification(context.payload);
    context.notification = notification;

    const tranId = readField(notification, 'tran_id');
    if (!tranId) {
      return this.invalid(context, 'Missing tran_id');
    }
    context.tranId = tranId;

    const orderId = parseOrderId(readField(notification, 'value_a'));
    if (orderId === null) {
      return this.invalid(context, 'Missing or malformed order id (value_a)');
    }
    context.orderId = orderId;

    return { kind: 'continue', context };
  }

  private invalid(context: CallbackContext, reason: string): StageResult {
    return {
      kind: 'skip',
      outcome: CallbackOutcome.INVALID_INPUT,
      reason,
      context,
    };
  }
}
