import {
  PaymentStatus,
  ProcessorStatus,
  RejectedPaymentStatus,
} from '../domain/enums';

const STATUS_MAP: ReadonlyMap<string, PaymentStatus> = new Map([
  [ProcessorStatus.VALID, PaymentStatus.PAID],
  [ProcessorStatus.VALIDATED, PaymentStatus.PAID],
  [ProcessorStatus.FAILED, PaymentStatus.FAILED],
  [ProcessorStatus.CANCELLED, PaymentStatus.CANCELLED],
  [ProcessorStatus.PENDING, PaymentStatus.PENDING],
]);

/**
 * Map a processor status to the domain payment status.
 * Exact, case-sensitive; anything unrecognized maps to FAILED.
 */
export function mapProcessorStatus(status: string): PaymentStatus {
  return STATUS_MAP.get(status) ?? PaymentStatus.FAILED;
}

export function isRejectedPaymentStatus(
  status: PaymentStatus,
): status is RejectedPaymentStatus {
  return status === PaymentStatus.FAILED || status === PaymentStatus.CANCELLED;
}
