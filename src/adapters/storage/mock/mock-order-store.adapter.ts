import {
  OrderRecord,
  OrderSnapshot,
  OrderStatus,
  OrderStore,
  OrderUpdate,
  PaymentStatus,
} from '../../../core';

/**
 * Mock order store for testing and local development
 * Keeps snapshots in memory so callers never share a mutable record
 */
export class MockOrderStore implements OrderStore {
  private orders: Map<number, OrderSnapshot> = new Map();
  private healthy = true;

  constructor(private readonly options: MockOrderStoreOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  async findOrder(orderId: number): Promise<OrderRecord | null> {
    await this.simulateLatency();

    const snapshot = this.orders.get(orderId);
    return snapshot ? OrderRecord.fromPlainObject(snapshot) : null;
  }

  /**
   * Unknown ids are a no-op, like an UPDATE matching no rows
   */
  async updateOrder(orderId: number, update: OrderUpdate): Promise<void> {
    await this.simulateLatency();

    const snapshot = this.orders.get(orderId);
    if (!snapshot) {
      return;
    }

    const order = OrderRecord.fromPlainObject(snapshot);
    order.applyUpdate(update);
    this.orders.set(orderId, order.toPlainObject());
  }

  /**
   * Check and write happen with no await in between
   */
  async updateOrderUnlessPaid(
    orderId: number,
    update: OrderUpdate,
  ): Promise<boolean> {
    await this.simulateLatency();

    const snapshot = this.orders.get(orderId);
    if (!snapshot || snapshot.paymentStatus === PaymentStatus.PAID) {
      return false;
    }

    const order = OrderRecord.fromPlainObject(snapshot);
    order.applyUpdate(update);
    this.orders.set(orderId, order.toPlainObject());
    return true;
  }

  async isHealthy(): Promise<boolean> {
    return this.healthy;
  }

  // ==================== Test helpers ====================

  /**
   * Add or replace an order
   */
  seed(
    orderId: number,
    fields: Partial<
      Pick<OrderSnapshot, 'paymentStatus' | 'orderStatus' | 'transactionId'>
    > = {},
  ): OrderRecord {
    const order = new OrderRecord(
      orderId,
      fields.paymentStatus ?? PaymentStatus.PENDING,
      fields.orderStatus ?? OrderStatus.INCOMPLETE,
      fields.transactionId ?? null,
    );
    this.orders.set(orderId, order.toPlainObject());
    return order;
  }

  getSnapshot(orderId: number): OrderSnapshot | undefined {
    const snapshot = this.orders.get(orderId);
    return snapshot ? { ...snapshot } : undefined;
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  clear(): void {
    this.orders.clear();
  }
}

export interface MockOrderStoreOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
}
