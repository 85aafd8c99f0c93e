import { OrderRecord, OrderUpdate } from '../domain/models';

/**
 * Order store adapter - the host's order persistence
 * Only the payment-related fields are ever written
 */
export interface OrderStore {
  /**
   * Find an order by its numeric id
   */
  findOrder(orderId: number): Promise<OrderRecord | null>;

  /**
   * Apply a partial update keyed by order id
   * MUST be a single write; callers never read-modify-write these fields
   */
  updateOrder(orderId: number, update: OrderUpdate): Promise<void>;

  /**
   * Apply a partial update only while the order is not paid.
   * The paid check and the write MUST be one atomic operation.
   * Resolves false when nothing was written.
   */
  updateOrderUnlessPaid(orderId: number, update: OrderUpdate): Promise<boolean>;

  /**
   * Check if the store is reachable
   */
  isHealthy(): Promise<boolean>;
}
