import { InboundNotification } from '../interfaces/common.types';
import { readField } from '../notification/inbound-notification';

/**
 * What the merchant keeps after the processor's fee, as 2-decimal strings
 */
export interface Settlement {
  amount: string;
  storeAmount: string;
  gatewayFee: string;
}

/**
 * Derive fee and earnings from a notification's amount and store_amount.
 * Without store_amount the whole amount is treated as earnings.
 */
export function computeSettlement(
  notification: InboundNotification,
): Settlement | undefined {
  const amount = parseDecimal(readField(notification, 'amount'));
  if (amount === undefined) {
    return undefined;
  }
  const storeAmount =
    parseDecimal(readField(notification, 'store_amount')) ?? amount;

  return {
    amount: amount.toFixed(2),
    storeAmount: storeAmount.toFixed(2),
    gatewayFee: (amount - storeAmount).toFixed(2),
  };
}

function parseDecimal(raw: string): number | undefined {
  if (raw === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
