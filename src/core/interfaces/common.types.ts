/**
 * Common types shared by the core, adapters and module
 */

/**
 * A single inbound field after sanitization
 */
export type NotificationValue = string | string[];

/**
 * Processor notification (redirect-back POST or IPN), untrusted until validated
 */
export type InboundNotification = Readonly<Record<string, NotificationValue>>;

/**
 * Outcome of a validation API round-trip
 */
export interface ValidationResult {
  confirmed: boolean;
  /** Processor-reported status, or a synthetic UNAVAILABLE / UNPARSEABLE */
  status: string;
  tranId?: string;
  amount?: number;
  currency?: string;
  currencyAmount?: number;
  reason?: string;
}

/**
 * Which HTTP entry point delivered a callback
 */
export type CallbackChannel = 'landing' | 'ipn';

/**
 * One callback delivery handed to the processor
 */
export interface CallbackRequest {
  /** Value of the `order_placement` query flag; absent for IPN */
  landingMode?: string;
  payload: unknown;
  channel: CallbackChannel;
}
