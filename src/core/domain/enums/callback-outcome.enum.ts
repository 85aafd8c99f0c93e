/**
 * Fate of a single callback delivery
 * Every delivery ends in exactly one of these
 */
export enum CallbackOutcome {
  /**
   * Validated and applied to the order
   */
  RECONCILED = 'reconciled',

  /**
   * Landing variant other than success (fail/cancel redirect)
   */
  NOT_APPLICABLE = 'not_applicable',

  /**
   * Transaction id or order correlation id missing or malformed
   */
  INVALID_INPUT = 'invalid_input',

  /**
   * Gateway settings absent or incomplete
   */
  UNCONFIGURED = 'unconfigured',

  /**
   * Hash, transport, status, transaction id or amount check failed
   */
  VALIDATION_FAILED = 'validation_failed',

  /**
   * Validated, but the order id is unknown to the store
   */
  ORDER_NOT_FOUND = 'order_not_found',

  /**
   * Processor-confirmed failure or cancellation written to the order
   */
  REJECTION_RECORDED = 'rejection_recorded',

  /**
   * Unexpected fault, swallowed at the pipeline boundary
   */
  ERROR = 'error',
}
