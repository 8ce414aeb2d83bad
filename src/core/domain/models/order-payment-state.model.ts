import { ProcessedEventKeys } from '../value-objects/event-key.vo';
import type { JsonObject } from '../../interfaces/common.types';

/**
 * Stored card reference for subscription renewals
 */
export interface StoredPaymentToken {
  token: string;
  /**
   * Masked, e.g. "**** 1111"
   */
  cardSummary: string;
  payfacReference: string;
  savedAt: string;
}

/**
 * Plain form persisted by order stores
 */
export interface OrderPaymentStateSnapshot {
  isManualCapture: boolean;
  checkoutReference: string;
  payfacReference: string;
  processedEventKeys: string[];
  lastRawEvent: JsonObject | null;
  refundRequested: boolean;
  cancelRequested: boolean;
  paymentToken: StoredPaymentToken | null;
}

/**
 * Per-order projection of the processor payment.
 *
 * Request flags are raised by the lifecycle bridge before it calls the
 * processor and lowered only by the reconciler once the confirming event
 * arrives.
 */
export class OrderPaymentState {
  constructor(
    public isManualCapture = false,
    public checkoutReference = '',
    public payfacReference = '',
    public readonly processedEventKeys = new ProcessedEventKeys(),
    public lastRawEvent: JsonObject | null = null,
    public refundRequested = false,
    public cancelRequested = false,
    public paymentToken: StoredPaymentToken | null = null,
  ) {}

  static fromSnapshot(
    snapshot?: Partial<OrderPaymentStateSnapshot> | null,
  ): OrderPaymentState {
    return new OrderPaymentState(
      snapshot?.isManualCapture ?? false,
      snapshot?.checkoutReference ?? '',
      snapshot?.payfacReference ?? '',
      new ProcessedEventKeys(snapshot?.processedEventKeys ?? []),
      snapshot?.lastRawEvent ?? null,
      snapshot?.refundRequested ?? false,
      snapshot?.cancelRequested ?? false,
      snapshot?.paymentToken ?? null,
    );
  }

  /**
   * Has a payment gone through the processor for this order
   */
  hasProcessorReference(): boolean {
    return this.payfacReference.length > 0;
  }

  /**
   * Record an event key and keep its payload for audit.
   * Returns false (and changes nothing) for a key seen before.
   */
  recordEvent(eventKey: string, rawEvent: JsonObject): boolean {
    if (!this.processedEventKeys.add(eventKey)) {
      return false;
    }
    this.lastRawEvent = rawEvent;
    return true;
  }

  toSnapshot(): OrderPaymentStateSnapshot {
    return {
      isManualCapture: this.isManualCapture,
      checkoutReference: this.checkoutReference,
      payfacReference: this.payfacReference,
      processedEventKeys: this.processedEventKeys.toArray(),
      lastRawEvent: this.lastRawEvent,
      refundRequested: this.refundRequested,
      cancelRequested: this.cancelRequested,
      paymentToken: this.paymentToken,
    };
  }
}
