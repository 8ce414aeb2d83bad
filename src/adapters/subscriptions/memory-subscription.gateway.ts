import {
  LinkedSubscription,
  StoredPaymentToken,
  SubscriptionGateway,
} from '../../core';

interface SubscriptionRecord extends LinkedSubscription {
  orderId: number;
  notes: string[];
}

/**
 * In-memory subscription gateway
 *
 * Stands in for the platform's subscription extension: keeps tokens per
 * order and subscriptions linked to their parent order.
 */
export class InMemorySubscriptionGateway implements SubscriptionGateway {
  private readonly tokens = new Map<number, StoredPaymentToken>();
  private readonly subscriptions = new Map<string, SubscriptionRecord>();

  async savePaymentToken(
    orderId: number,
    token: StoredPaymentToken,
  ): Promise<void> {
    this.tokens.set(orderId, { ...token });
  }

  async findSubscriptionsForOrder(
    orderId: number,
  ): Promise<LinkedSubscription[]> {
    return [...this.subscriptions.values()]
      .filter((record) => record.orderId === orderId)
      .map(({ id, status }) => ({ id, status }));
  }

  async cancelSubscription(
    subscriptionId: string,
    note: string,
  ): Promise<boolean> {
    const record = this.subscriptions.get(subscriptionId);
    if (!record || record.status === 'cancelled') {
      return false;
    }

    record.status = 'cancelled';
    record.notes.push(note);
    return true;
  }

  /**
   * Link a subscription to the order that started it
   */
  linkSubscription(orderId: number, subscriptionId: string): void {
    this.subscriptions.set(subscriptionId, {
      id: subscriptionId,
      orderId,
      status: 'active',
      notes: [],
    });
  }

  getPaymentToken(orderId: number): StoredPaymentToken | undefined {
    return this.tokens.get(orderId);
  }

  getSubscription(subscriptionId: string): SubscriptionRecord | undefined {
    return this.subscriptions.get(subscriptionId);
  }
}
