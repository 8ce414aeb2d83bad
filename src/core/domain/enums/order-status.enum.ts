/**
 * Order statuses owned by the commerce platform.
 * The reconciler only moves orders between these; it never adds its own.
 */
export enum OrderStatus {
  PENDING = 'pending',
  ON_HOLD = 'on-hold',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  REFUNDED = 'refunded',
  FAILED = 'failed',
}

/**
 * Statuses in which the shopper's money has been collected
 */
export function isPaidStatus(status: OrderStatus): boolean {
  return status === OrderStatus.PROCESSING || status === OrderStatus.COMPLETED;
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return (
    typeof value === 'string' &&
    Object.values<string>(OrderStatus).includes(value)
  );
}
