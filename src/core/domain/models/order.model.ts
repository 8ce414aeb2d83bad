import { OrderStatus, isPaidStatus } from '../enums';
import { Money } from '../value-objects/money.vo';
import {
  OrderPaymentState,
  OrderPaymentStateSnapshot,
} from './order-payment-state.model';

/**
 * Human-readable entry on the order's timeline
 */
export interface OrderNote {
  /**
   * Assigned by the store once persisted
   */
  id?: number;
  message: string;
  createdAt: Date;
}

export interface OrderSnapshot {
  id: number;
  reference: string;
  status: OrderStatus;
  total: number;
  currency: string;
  needsProcessing: boolean;
  shippingTotal: number;
  lines: OrderLine[];
  notes: OrderNote[];
  paymentState: OrderPaymentStateSnapshot;
}

/**
 * Order line used to build hosted checkout items
 */
export interface OrderLine {
  name: string;
  /**
   * Minor units, tax included
   */
  total: number;
}

/**
 * Order as the commerce platform exposes it to the reconciler.
 * Status and notes are the only platform fields the core writes.
 */
export class Order {
  constructor(
    public readonly id: number,
    public readonly reference: string,
    public status: OrderStatus,
    public readonly money: Money,
    public readonly needsProcessing: boolean = true,
    public readonly paymentState: OrderPaymentState = new OrderPaymentState(),
    public readonly notes: OrderNote[] = [],
    public readonly lines: OrderLine[] = [],
    public readonly shippingTotal: number = 0,
  ) {}

  get total(): number {
    return this.money.amount;
  }

  get currency(): string {
    return this.money.currency;
  }

  isPaid(): boolean {
    return isPaidStatus(this.status);
  }

  addNote(message: string): void {
    this.notes.push({ message, createdAt: new Date() });
  }

  /**
   * Move to a new status, writing one note for the change.
   * Returns false when the order already has that status (the note is
   * still written).
   */
  updateStatus(status: OrderStatus, note: string): boolean {
    if (this.status === status) {
      this.addNote(note);
      return false;
    }

    const from = this.status;
    this.status = status;
    this.addNote(`${note}\nOrder status changed from ${from} to ${status}.`);
    return true;
  }

  static fromSnapshot(snapshot: OrderSnapshot): Order {
    return new Order(
      snapshot.id,
      snapshot.reference,
      snapshot.status,
      new Money(snapshot.total, snapshot.currency),
      snapshot.needsProcessing,
      OrderPaymentState.fromSnapshot(snapshot.paymentState),
      snapshot.notes.map((note) => ({ ...note })),
      snapshot.lines.map((line) => ({ ...line })),
      snapshot.shippingTotal,
    );
  }

  toSnapshot(): OrderSnapshot {
    return {
      id: this.id,
      reference: this.reference,
      status: this.status,
      total: this.total,
      currency: this.currency,
      needsProcessing: this.needsProcessing,
      shippingTotal: this.shippingTotal,
      lines: this.lines.map((line) => ({ ...line })),
      notes: this.notes.map((note) => ({ ...note })),
      paymentState: this.paymentState.toSnapshot(),
    };
  }
}
