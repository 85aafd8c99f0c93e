import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { OrderStatus, PaymentStatus } from '../../../../core';

/**
 * TypeORM entity for the host's orders table
 */
@Entity('orders')
@Index(['transactionId'])
export class OrderEntity {
  @PrimaryColumn({ type: 'integer' })
  id!: number;

  @Column({
    type: 'varchar',
    length: 32,
    name: 'payment_status',
    default: PaymentStatus.PENDING,
  })
  paymentStatus!: PaymentStatus;

  @Column({
    type: 'varchar',
    length: 32,
    name: 'order_status',
    default: OrderStatus.INCOMPLETE,
  })
  orderStatus!: OrderStatus;

  @Column({ type: 'varchar', name: 'transaction_id', nullable: true })
  transactionId!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
