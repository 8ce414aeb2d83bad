import {
  Order,
  OrderNotFoundError,
  OrderSnapshot,
  OrderStore,
} from '../../../core';
import { KeyedMutex } from '../keyed-mutex';

export interface InMemoryOrderStoreOptions {
  /**
   * Delay before each locked read, to widen race windows in tests
   */
  simulateLatency?: boolean;
  latencyMs?: number;
}

/**
 * In-memory order store
 *
 * Orders are kept as snapshots, so work that rejects leaves nothing
 * behind. Used by the default module wiring and by tests.
 */
export class InMemoryOrderStore implements OrderStore {
  private readonly orders = new Map<number, OrderSnapshot>();
  private readonly mutex = new KeyedMutex<number>();
  private noteCounter = 0;

  constructor(private readonly options: InMemoryOrderStoreOptions = {}) {}

  async findOrder(orderId: number): Promise<Order | null> {
    const snapshot = this.orders.get(orderId);
    return snapshot ? Order.fromSnapshot(snapshot) : null;
  }

  async withOrderLock<T>(
    orderId: number,
    work: (order: Order) => Promise<T> | T,
  ): Promise<T> {
    return this.mutex.runExclusive(orderId, async () => {
      await this.simulateLatency();

      const snapshot = this.orders.get(orderId);
      if (!snapshot) {
        throw new OrderNotFoundError(orderId);
      }

      const order = Order.fromSnapshot(snapshot);
      const result = await work(order);
      this.store(order);
      return result;
    });
  }

  async saveOrder(order: Order): Promise<Order> {
    this.store(order);
    return order;
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.orders.clear();
    this.noteCounter = 0;
  }

  private store(order: Order): void {
    for (const note of order.notes) {
      if (note.id === undefined) {
        note.id = ++this.noteCounter;
      }
    }
    this.orders.set(order.id, order.toSnapshot());
  }

  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }
}
