import { OrderStatus, PaymentStatus } from '../enums';

/**
 * Partial-field write applied to an order by reconciliation.
 * Keyed by order id; never read-modify-write.
 */
export interface OrderUpdate {
  paymentStatus: PaymentStatus;
  transactionId: string;
  orderStatus?: OrderStatus;
}

/**
 * Order record as owned by the checkout host
 * Reconciliation only touches payment status, order status and transaction id
 */
export class OrderRecord {
  constructor(
    public readonly id: number,
    public paymentStatus: PaymentStatus = PaymentStatus.PENDING,
    public orderStatus: OrderStatus = OrderStatus.INCOMPLETE,
    public transactionId: string | null = null,
    public readonly createdAt: Date = new Date(),
    public updatedAt: Date = new Date(),
  ) {}

  isPaid(): boolean {
    return this.paymentStatus === PaymentStatus.PAID;
  }

  /**
   * Apply a reconciliation write. Fields absent from the update stay as they are.
   */
  applyUpdate(update: OrderUpdate): void {
    this.paymentStatus = update.paymentStatus;
    this.transactionId = update.transactionId;
    if (update.orderStatus) {
      this.orderStatus = update.orderStatus;
    }
    this.updatedAt = new Date();
  }

  toPlainObject(): OrderSnapshot {
    return {
      id: this.id,
      paymentStatus: this.paymentStatus,
      orderStatus: this.orderStatus,
      transactionId: this.transactionId,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  static fromPlainObject(data: OrderSnapshot): OrderRecord {
    return new OrderRecord(
      data.id,
      data.paymentStatus,
      data.orderStatus,
      data.transactionId,
      new Date(data.createdAt),
      new Date(data.updatedAt),
    );
  }
}

export interface OrderSnapshot {
  id: number;
  paymentStatus: PaymentStatus;
  orderStatus: OrderStatus;
  transactionId: string | null;
  createdAt: Date;
  updatedAt: Date;
}
