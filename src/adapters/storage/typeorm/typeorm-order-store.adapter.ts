import { DataSource, EntityManager, FindOneOptions } from 'typeorm';
import {
  isOrderStatus,
  Money,
  Order,
  OrderNotFoundError,
  OrderPaymentState,
  OrderStore,
} from '../../../core';
import { KeyedMutex } from '../keyed-mutex';
import { OrderEntity, OrderNoteEntity } from './entities';

/**
 * Drivers without SELECT ... FOR UPDATE
 */
const DRIVERS_WITHOUT_ROW_LOCKS = ['sqlite', 'better-sqlite3', 'sqljs'];

/**
 * Lock key shared by every order on single-connection drivers.
 * Order ids are positive, so it never collides with one.
 */
const SINGLE_WRITER_KEY = 0;

/**
 * TypeORM implementation of OrderStore
 *
 * withOrderLock holds an in-process lock for the order and, where the
 * driver supports it, a pessimistic row lock inside one database
 * transaction. SQLite drivers share one connection, so there all writes
 * are serialized under a single key.
 */
export class TypeORMOrderStore implements OrderStore {
  private readonly mutex = new KeyedMutex<number>();
  private readonly supportsRowLocks: boolean;

  constructor(private readonly dataSource: DataSource) {
    this.supportsRowLocks = !DRIVERS_WITHOUT_ROW_LOCKS.includes(
      dataSource.options.type,
    );
  }

  async findOrder(orderId: number): Promise<Order | null> {
    const manager = this.dataSource.manager;
    const entity = await manager.findOne(OrderEntity, {
      where: { id: orderId },
    });
    if (!entity) {
      return null;
    }
    return this.mapOrderEntityToDomain(
      entity,
      await this.loadNotes(manager, orderId),
    );
  }

  async withOrderLock<T>(
    orderId: number,
    work: (order: Order) => Promise<T> | T,
  ): Promise<T> {
    return this.mutex.runExclusive(this.lockKey(orderId), () =>
      this.withTransaction(async (manager) => {
        const options: FindOneOptions<OrderEntity> = {
          where: { id: orderId },
          ...(this.supportsRowLocks
            ? { lock: { mode: 'pessimistic_write' as const } }
            : {}),
        };

        const entity = await manager.findOne(OrderEntity, options);
        if (!entity) {
          throw new OrderNotFoundError(orderId);
        }

        const order = this.mapOrderEntityToDomain(
          entity,
          await this.loadNotes(manager, orderId),
        );
        const result = await work(order);

        entity.status = order.status;
        entity.paymentState = order.paymentState.toSnapshot();
        await manager.save(entity);
        await this.insertNewNotes(manager, order);

        return result;
      }),
    );
  }

  async saveOrder(order: Order): Promise<Order> {
    return this.mutex.runExclusive(this.lockKey(order.id), () =>
      this.withTransaction(async (manager) => {
        const entity = manager.create(OrderEntity, {
          id: order.id,
          reference: order.reference,
          status: order.status,
          total: order.total,
          currency: order.currency,
          needsProcessing: order.needsProcessing,
          shippingTotal: order.shippingTotal,
          lines: order.lines,
          paymentState: order.paymentState.toSnapshot(),
        });
        await manager.save(entity);
        await this.insertNewNotes(manager, order);
        return order;
      }),
    );
  }

  async withTransaction<T>(
    callback: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await callback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Health Check
   */
  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private lockKey(orderId: number): number {
    return this.supportsRowLocks ? orderId : SINGLE_WRITER_KEY;
  }

  private async loadNotes(
    manager: EntityManager,
    orderId: number,
  ): Promise<OrderNoteEntity[]> {
    return manager.find(OrderNoteEntity, {
      where: { orderId },
      order: { id: 'ASC' },
    });
  }

  /**
   * Notes are append-only; only those without an id are new
   */
  private async insertNewNotes(
    manager: EntityManager,
    order: Order,
  ): Promise<void> {
    for (const note of order.notes) {
      if (note.id !== undefined) {
        continue;
      }
      const saved = await manager.save(
        manager.create(OrderNoteEntity, {
          orderId: order.id,
          message: note.message,
        }),
      );
      note.id = saved.id;
    }
  }

  private mapOrderEntityToDomain(
    entity: OrderEntity,
    notes: OrderNoteEntity[],
  ): Order {
    // Column is free text; another writer may have stored anything
    if (!isOrderStatus(entity.status)) {
      throw new Error(
        `Order ${entity.id} has unknown status ${String(entity.status)}`,
      );
    }

    return new Order(
      entity.id,
      entity.reference,
      entity.status,
      new Money(entity.total, entity.currency),
      entity.needsProcessing,
      OrderPaymentState.fromSnapshot(entity.paymentState),
      notes.map((note) => ({
        id: note.id,
        message: note.message,
        createdAt: note.createdAt,
      })),
      entity.lines ?? [],
      entity.shippingTotal,
    );
  }
}
