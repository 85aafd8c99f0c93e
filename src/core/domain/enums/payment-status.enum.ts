/**
 * Payment state of an order as the checkout host stores it
 */
export enum PaymentStatus {
  /**
   * Order placed, no confirmed payment yet
   */
  PENDING = 'pending',

  /**
   * Payment confirmed by the processor's validation API
   */
  PAID = 'paid',

  /**
   * Payment attempt failed
   */
  FAILED = 'failed',

  /**
   * Payer cancelled at the gateway
   */
  CANCELLED = 'cancelled',
}

/**
 * Statuses a validated rejection may write back to an order
 */
export type RejectedPaymentStatus =
  | PaymentStatus.FAILED
  | PaymentStatus.CANCELLED;
