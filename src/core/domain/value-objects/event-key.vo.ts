import type { PaymentEvent } from '../models/payment-event.model';

/**
 * Fields an EventKey is built from
 */
export type EventKeySource = Pick<
  PaymentEvent,
  'payfacReference' | 'rawEventType' | 'originalPayfacReference' | 'amount'
>;

/**
 * Deduplication identity of a processor event:
 * `payfacReference:eventType:originalPayfacReference:amount`.
 *
 * Empty segments are kept so that "P1:refund::100" and "P1:refund:100:"
 * stay distinct.
 */
export function deriveEventKey(event: Partial<EventKeySource>): string {
  return [
    event.payfacReference ?? '',
    event.rawEventType || 'unknown',
    event.originalPayfacReference ?? '',
    String(event.amount ?? 0),
  ].join(':');
}

/**
 * Append-only set of EventKeys already applied to one order
 */
export class ProcessedEventKeys implements Iterable<string> {
  private readonly keys: Set<string>;

  constructor(keys: Iterable<string> = []) {
    this.keys = new Set(keys);
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  /**
   * Record a key. Returns false when it was already present.
   */
  add(key: string): boolean {
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }

  get size(): number {
    return this.keys.size;
  }

  toArray(): string[] {
    return [...this.keys];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.keys.values();
  }
}
