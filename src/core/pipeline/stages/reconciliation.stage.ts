import { Logger } from '@nestjs/common';
import { CallbackOutcome, ProcessorStatus } from '../../domain/enums';
import { readField } from '../../notification/inbound-notification';
import {
  OrderReconciler,
  ReconcileResult,
} from '../../reconciliation/order-reconciler';
import { computeSettlement } from '../../reconciliation/settlement';
import {
  isRejectedPaymentStatus,
  mapProcessorStatus,
} from '../../status/status-mapper';
import { CallbackContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 6: Reconciliation
 * Applies a confirmed result to the order. A negative validation changes
 * nothing unless rejection write-back is enabled.
 */
export class ReconciliationStage implements PipelineStage {
  name = 'reconciliation';
  private readonly logger = new Logger(ReconciliationStage.name);

  constructor(
    private readonly reconciler: OrderReconciler,
    private readonly writeBackRejections = false,
  ) {}

  async execute(context: CallbackContext): Promise<StageResult> {
    const { notification, validation, orderId, tranId } = context;
    if (!notification || !validation || orderId === undefined || !tranId) {
      return {
        kind: 'error',
        error: new Error('Reconciliation requires a validated notification'),
        context,
      };
    }

    if (!validation.confirmed) {
      if (this.writeBackRejections && validation.tranId === tranId) {
        const rejected = mapProcessorStatus(validation.status);
        if (
          isRejectedPaymentStatus(rejected) &&
          (validation.status === ProcessorStatus.FAILED ||
            validation.status === ProcessorStatus.CANCELLED)
        ) {
          context.paymentStatus = rejected;
          const result = await this.reconciler.reconcileRejection(
            orderId,
            rejected,
            tranId,
          );
          return this.finish(context, result, CallbackOutcome.REJECTION_RECORDED);
        }
      }

      this.logger.warn(
        `Transaction ${tranId} not confirmed: ${validation.reason ?? validation.status}`,
      );
      return {
        kind: 'skip',
        outcome: CallbackOutcome.VALIDATION_FAILED,
        reason: validation.reason ?? 'validation_failed',
        context,
      };
    }

    const status = readField(notification, 'status') || ProcessorStatus.FAILED;
    context.paymentStatus = mapProcessorStatus(status);
    context.settlement = computeSettlement(notification);

    const result = await this.reconciler.reconcile(
      orderId,
      context.paymentStatus,
      tranId,
    );
    return this.finish(context, result, CallbackOutcome.RECONCILED);
  }

  private finish(
    context: CallbackContext,
    result: ReconcileResult,
    appliedOutcome: CallbackOutcome,
  ): StageResult {
    switch (result.outcome) {
      case 'applied':
        context.outcome = appliedOutcome;
        return { kind: 'continue', context, metadata: { update: result.update } };
      case 'not_found':
        return {
          kind: 'skip',
          outcome: CallbackOutcome.ORDER_NOT_FOUND,
          reason: `Order ${result.orderId} not found`,
          context,
        };
      case 'skipped_paid':
        return {
          kind: 'skip',
          outcome: CallbackOutcome.VALIDATION_FAILED,
          reason: `Order ${result.orderId} already paid`,
          context,
        };
    }
  }
}
