import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
  VersionColumn,
} from 'typeorm';
import {
  OrderLine,
  OrderPaymentStateSnapshot,
  OrderStatus,
} from '../../../../core';
import { OrderNoteEntity } from './order-note.entity';

/**
 * TypeORM entity for an order and its attached payment state
 */
@Entity('orders')
@Index(['status'])
export class OrderEntity {
  /**
   * Platform order id, not generated here
   */
  @PrimaryColumn({ type: 'integer' })
  id!: number;

  @Column({ type: 'varchar', length: 64 })
  reference!: string;

  @Column({ type: 'varchar', length: 20, default: OrderStatus.PENDING })
  status!: OrderStatus;

  @Column({ type: 'integer' })
  total!: number;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ name: 'needs_processing', type: 'boolean', default: true })
  needsProcessing!: boolean;

  @Column({ name: 'shipping_total', type: 'integer', default: 0 })
  shippingTotal!: number;

  @Column({ type: 'simple-json' })
  lines!: OrderLine[];

  @Column({ name: 'payment_state', type: 'simple-json' })
  paymentState!: OrderPaymentStateSnapshot;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @VersionColumn({ name: 'version' })
  version!: number;

  @OneToMany(() => OrderNoteEntity, (note) => note.order)
  notes?: OrderNoteEntity[];
}
