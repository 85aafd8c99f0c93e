import { Logger } from '@nestjs/common';
import {
  OrderStatus,
  PaymentStatus,
  RejectedPaymentStatus,
} from '../domain/enums';
import { OrderUpdate } from '../domain/models';
import { OrderStore } from '../interfaces/order-store.adapter';

export type ReconcileOutcome = 'applied' | 'not_found' | 'skipped_paid';

export interface ReconcileResult {
  outcome: ReconcileOutcome;
  orderId: number;
  update?: OrderUpdate;
}

/**
 * Applies validated payment results to the host's orders
 *
 * Every write is a single partial update keyed by order id. Repeating the
 * same (order, status, transaction) leaves the record unchanged, which is
 * what makes at-least-once callback delivery safe.
 */
export class OrderReconciler {
  private readonly logger = new Logger(OrderReconciler.name);

  constructor(private readonly orderStore: OrderStore) {}

  static buildUpdate(
    paymentStatus: PaymentStatus,
    transactionId: string,
  ): OrderUpdate {
    const update: OrderUpdate = { paymentStatus, transactionId };
    if (paymentStatus === PaymentStatus.PAID) {
      update.orderStatus = OrderStatus.COMPLETED;
    }
    return update;
  }

  async reconcile(
    orderId: number,
    paymentStatus: PaymentStatus,
    transactionId: string,
  ): Promise<ReconcileResult> {
    const order = await this.orderStore.findOrder(orderId);
    if (!order) {
      this.logger.warn(
        `Order ${orderId} not found for transaction ${transactionId}`,
      );
      return { outcome: 'not_found', orderId };
    }

    const update = OrderReconciler.buildUpdate(paymentStatus, transactionId);
    await this.orderStore.updateOrder(orderId, update);

    this.logger.log(
      `Order ${orderId} reconciled: payment=${paymentStatus} transaction=${transactionId}`,
    );
    return { outcome: 'applied', orderId, update };
  }

  /**
   * Record a processor-confirmed failure or cancellation.
   * An order already paid is left alone.
   */
  async reconcileRejection(
    orderId: number,
    paymentStatus: RejectedPaymentStatus,
    transactionId: string,
  ): Promise<ReconcileResult> {
    const order = await this.orderStore.findOrder(orderId);
    if (!order) {
      this.logger.warn(
        `Order ${orderId} not found for rejected transaction ${transactionId}`,
      );
      return { outcome: 'not_found', orderId };
    }

    if (order.isPaid()) {
      this.logger.warn(
        `Order ${orderId} already paid; ignoring ${paymentStatus} for transaction ${transactionId}`,
      );
      return { outcome: 'skipped_paid', orderId };
    }

    const update = OrderReconciler.buildUpdate(paymentStatus, transactionId);
    // A paid write may land after the read above; the store re-checks
    const written = await this.orderStore.updateOrderUnlessPaid(
      orderId,
      update,
    );
    if (!written) {
      this.logger.warn(
        `Order ${orderId} paid concurrently; ignoring ${paymentStatus} for transaction ${transactionId}`,
      );
      return { outcome: 'skipped_paid', orderId };
    }

    this.logger.log(`Order ${orderId} marked ${paymentStatus}`);
    return { outcome: 'applied', orderId, update };
  }
}
