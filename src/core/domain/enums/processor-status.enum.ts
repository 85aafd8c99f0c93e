/**
 * Status vocabulary used by SSLCommerz in callbacks and validation responses
 */
export enum ProcessorStatus {
  VALID = 'VALID',
  VALIDATED = 'VALIDATED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
  PENDING = 'PENDING',
  INVALID_TRANSACTION = 'INVALID_TRANSACTION',
  UNATTEMPTED = 'UNATTEMPTED',
  EXPIRED = 'EXPIRED',
}

/**
 * Validation API statuses that make a response authoritative
 */
export const CONFIRMED_PROCESSOR_STATUSES: readonly string[] = [
  ProcessorStatus.VALID,
  ProcessorStatus.VALIDATED,
];

export function isConfirmedProcessorStatus(status: string): boolean {
  return CONFIRMED_PROCESSOR_STATUSES.includes(status);
}
