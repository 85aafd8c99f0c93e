/**
 * Fulfilment state of an order
 * Only moves to COMPLETED together with a PAID payment status
 */
export enum OrderStatus {
  INCOMPLETE = 'incomplete',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
}
