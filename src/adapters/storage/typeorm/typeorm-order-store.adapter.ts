import { DataSource, Not, Repository } from 'typeorm';
import {
  OrderRecord,
  OrderStore,
  OrderUpdate,
  PaymentStatus,
} from '../../../core';
import { OrderEntity } from './entities';

/**
 * TypeORM implementation of OrderStore for PostgreSQL
 */
export class TypeORMOrderStore implements OrderStore {
  private orderRepo: Repository<OrderEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.orderRepo = dataSource.getRepository(OrderEntity);
  }

  async findOrder(orderId: number): Promise<OrderRecord | null> {
    const entity = await this.orderRepo.findOne({ where: { id: orderId } });
    return entity ? this.mapOrderEntityToDomain(entity) : null;
  }

  /**
   * Single UPDATE keyed by id; only the supplied columns are written
   */
  async updateOrder(orderId: number, update: OrderUpdate): Promise<void> {
    await this.orderRepo.update({ id: orderId }, this.toColumns(update));
  }

  /**
   * Conditional UPDATE; the paid guard is part of the WHERE clause
   */
  async updateOrderUnlessPaid(
    orderId: number,
    update: OrderUpdate,
  ): Promise<boolean> {
    const result = await this.orderRepo.update(
      { id: orderId, paymentStatus: Not(PaymentStatus.PAID) },
      this.toColumns(update),
    );
    return (result.affected ?? 0) > 0;
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private toColumns(
    update: OrderUpdate,
  ): Partial<
    Pick<OrderEntity, 'paymentStatus' | 'transactionId' | 'orderStatus'>
  > {
    const columns: Partial<
      Pick<OrderEntity, 'paymentStatus' | 'transactionId' | 'orderStatus'>
    > = {
      paymentStatus: update.paymentStatus,
      transactionId: update.transactionId,
    };
    if (update.orderStatus) {
      columns.orderStatus = update.orderStatus;
    }
    return columns;
  }

  private mapOrderEntityToDomain(entity: OrderEntity): OrderRecord {
    return new OrderRecord(
      entity.id,
      entity.paymentStatus,
      entity.orderStatus,
      entity.transactionId,
      entity.createdAt,
      entity.updatedAt,
    );
  }
}
