import { CallbackOutcome, PaymentStatus } from '../domain/enums';
import { ClientCredentials } from '../domain/value-objects/client-credentials.vo';
import {
  CallbackChannel,
  InboundNotification,
  ValidationResult,
} from '../interfaces/common.types';
import { OrderStore } from '../interfaces/order-store.adapter';
import { SettingsSource } from '../interfaces/settings-source.interface';
import { SslcommerzValidationClient } from '../validation/validation-client';
import { Settlement } from '../reconciliation/settlement';

/**
 * Callback processing context passed through the pipeline
 */
export interface CallbackContext {
  // Raw input
  channel: CallbackChannel;
  landingMode?: string;
  payload: unknown;

  // Processing metadata
  processingId: string;

  // Extraction
  notification?: InboundNotification;
  tranId?: string;
  orderId?: number;

  // Credentials
  credentials?: ClientCredentials;

  // Verification and validation
  hashVerified?: boolean;
  validation?: ValidationResult;

  // Reconciliation
  paymentStatus?: PaymentStatus;
  settlement?: Settlement;
  outcome?: CallbackOutcome;

  metadata: Record<string, unknown>;
}

/**
 * Pipeline stage result
 *
 * - continue: hand the context to the next stage
 * - skip: stop with a terminal outcome (a soft no-op, not a fault)
 * - error: stop; the processor logs it and reports CallbackOutcome.ERROR
 */
export type StageResult =
  | { kind: 'continue'; context: CallbackContext; metadata?: Record<string, unknown> }
  | {
      kind: 'skip';
      outcome: CallbackOutcome;
      reason: string;
      context: CallbackContext;
      metadata?: Record<string, unknown>;
    }
  | { kind: 'error'; error: Error; context: CallbackContext; metadata?: Record<string, unknown> };

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: CallbackContext): Promise<StageResult>;
}

/**
 * Lifecycle hooks, called after every delivery
 * Hook failures are logged and never change the result
 */
export interface CallbackHooks {
  onOutcome?: (result: CallbackResult) => void | Promise<void>;
  onError?: (error: Error, context: CallbackContext) => void | Promise<void>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  // Adapters
  orderStore: OrderStore;
  settingsSource: SettingsSource;
  validationClient?: SslcommerzValidationClient;

  // Configuration
  gatewayName?: string;
  successMarker?: string;
  writeBackRejections?: boolean;

  // Lifecycle hooks
  hooks?: CallbackHooks;
}

/**
 * Result returned for every delivery
 */
export interface CallbackResult {
  processingId: string;
  channel: CallbackChannel;
  outcome: CallbackOutcome;
  reason?: string;
  orderId?: number;
  tranId?: string;
  paymentStatus?: PaymentStatus;
  settlement?: Settlement;
  durationMs: number;
  stageDurations: Record<string, number>;
  error?: Error;
}

/**
 * Pipeline error with the failing stage
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly context: CallbackContext,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
