import { Order } from '../domain/models';

/**
 * Order store adapter - the commerce platform's order record as seen by
 * the reconciler.
 *
 * Implementations own persistence of status, notes and the attached
 * payment state. Nothing else about the order is written.
 */
export interface OrderStore {
  /**
   * Read an order without locking. Returns null for an unknown id.
   */
  findOrder(orderId: number): Promise<Order | null>;

  /**
   * Load the order under a per-order exclusive lock, run `work` against it
   * and persist the order when `work` resolves.
   *
   * MUST serialize callers for the same order id; callers for different
   * orders must not wait on each other. If `work` rejects nothing is
   * persisted and the rejection propagates.
   *
   * @throws OrderNotFoundError when the order does not exist
   */
  withOrderLock<T>(
    orderId: number,
    work: (order: Order) => Promise<T> | T,
  ): Promise<T>;

  /**
   * Insert or replace an order. Used by the platform integration and
   * fixtures; the reconciler itself goes through withOrderLock.
   */
  saveOrder(order: Order): Promise<Order>;

  /**
   * Health check for the backing store
   */
  isHealthy(): Promise<boolean>;
}
