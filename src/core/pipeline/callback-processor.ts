import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { CallbackOutcome } from '../domain/enums';
import { CallbackRequest } from '../interfaces/common.types';
import { OrderReconciler } from '../reconciliation/order-reconciler';
import { SslcommerzValidationClient } from '../validation/validation-client';
import {
  CallbackContext,
  CallbackHooks,
  CallbackResult,
  PipelineConfig,
  PipelineError,
  PipelineStage,
} from './types';
import { LandingFilterStage } from './stages/landing-filter.stage';
import { ExtractionStage } from './stages/extraction.stage';
import { CredentialsStage } from './stages/credentials.stage';
import { VerificationStage } from './stages/verification.stage';
import { ValidationStage } from './stages/validation.stage';
import { ReconciliationStage } from './stages/reconciliation.stage';

interface PipelineRun {
  outcome: CallbackOutcome;
  reason?: string;
}

/**
 * CallbackProcessor runs one callback delivery through the pipeline
 *
 * Pipeline stages:
 * 1. Landing filter - Only the success landing (or IPN) proceeds
 * 2. Extraction - Sanitize body, require tran_id and order id
 * 3. Credentials - Load gateway settings
 * 4. Verification - Check the notification hash
 * 5. Validation - Confirm with the processor's validation API
 * 6. Reconciliation - Apply the result to the order
 *
 * process() never throws; every delivery ends in exactly one outcome.
 */
export class CallbackProcessor {
  private readonly logger = new Logger(CallbackProcessor.name);
  private readonly stages: PipelineStage[];
  private readonly hooks?: CallbackHooks;

  constructor(private readonly config: PipelineConfig) {
    this.hooks = config.hooks;
    this.stages = this.initializeStages();
  }

  async process(request: CallbackRequest): Promise<CallbackResult> {
    const startTime = Date.now();
    const stageDurations: Record<string, number> = {};

    const context: CallbackContext = {
      channel: request.channel,
      landingMode: request.landingMode,
      payload: request.payload,
      processingId: uuidv4(),
      metadata: {},
    };

    let run: PipelineRun;
    let error: Error | undefined;

    try {
      run = await this.executePipeline(context, stageDurations);
    } catch (caught) {
      const failure =
        caught instanceof Error ? caught : new Error(String(caught));
      error = failure;
      run = { outcome: CallbackOutcome.ERROR, reason: failure.message };

      this.logger.error(
        `Callback ${context.processingId} failed: ${failure.message}`,
        failure.stack,
      );
      await this.callHook('onError', () =>
        this.hooks?.onError?.(failure, context),
      );
    }

    context.outcome = run.outcome;
    const result: CallbackResult = {
      processingId: context.processingId,
      channel: context.channel,
      outcome: run.outcome,
      reason: run.reason,
      orderId: context.orderId,
      tranId: context.tranId,
      paymentStatus: context.paymentStatus,
      settlement: context.settlement,
      durationMs: Date.now() - startTime,
      stageDurations,
      error,
    };

    this.logOutcome(result);
    await this.callHook('onOutcome', () => this.hooks?.onOutcome?.(result));

    return result;
  }

  /**
   * Execute the pipeline stages sequentially
   */
  private async executePipeline(
    context: CallbackContext,
    stageDurations: Record<string, number>,
  ): Promise<PipelineRun> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);
        stageDurations[stage.name] = Date.now() - stageStartTime;

        if (result.metadata) {
          context.metadata[stage.name] = result.metadata;
        }

        if (result.kind === 'skip') {
          return { outcome: result.outcome, reason: result.reason };
        }
        if (result.kind === 'error') {
          throw result.error;
        }
      } catch (error) {
        stageDurations[stage.name] = Date.now() - stageStartTime;

        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          context,
          error instanceof Error ? error : undefined,
        );
      }
    }

    return { outcome: context.outcome ?? CallbackOutcome.ERROR };
  }

  /**
   * Initialize pipeline stages based on configuration
   */
  private initializeStages(): PipelineStage[] {
    const validationClient =
      this.config.validationClient ?? new SslcommerzValidationClient();
    const reconciler = new OrderReconciler(this.config.orderStore);

    return [
      new LandingFilterStage(this.config.successMarker),
      new ExtractionStage(),
      new CredentialsStage(this.config.settingsSource, this.config.gatewayName),
      new VerificationStage(),
      new ValidationStage(validationClient),
      new ReconciliationStage(
        reconciler,
        this.config.writeBackRejections ?? false,
      ),
    ];
  }

  private logOutcome(result: CallbackResult): void {
    const subject = result.tranId
      ? `transaction ${result.tranId}`
      : `callback ${result.processingId}`;
    const message = `${result.channel} ${subject}: ${result.outcome}${result.reason ? ` (${result.reason})` : ''}`;

    switch (result.outcome) {
      case CallbackOutcome.RECONCILED:
      case CallbackOutcome.REJECTION_RECORDED:
        this.logger.log(message);
        break;
      case CallbackOutcome.NOT_APPLICABLE:
        this.logger.debug(message);
        break;
      case CallbackOutcome.ERROR:
        break;
      default:
        this.logger.warn(message);
    }
  }

  private async callHook(
    name: keyof CallbackHooks,
    invoke: () => void | Promise<void>,
  ): Promise<void> {
    try {
      await invoke();
    } catch (error) {
      this.logger.error(
        `Hook ${name} threw: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): {
    stages: string[];
    configuration: {
      gatewayName: string;
      successMarker: string;
      writeBackRejections: boolean;
    };
  } {
    return {
      stages: this.stages.map((s) => s.name),
      configuration: {
        gatewayName: this.config.gatewayName ?? 'sslcommerz',
        successMarker: this.config.successMarker ?? 'success',
        writeBackRejections: this.config.writeBackRejections ?? false,
      },
    };
  }
}
