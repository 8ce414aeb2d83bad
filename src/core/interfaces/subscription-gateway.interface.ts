import { StoredPaymentToken } from '../domain/models';

/**
 * Subscription linked to the order that started it
 */
export interface LinkedSubscription {
  id: string;
  status: string;
}

/**
 * Subscription collaborator. The renewal billing job lives behind it;
 * the reconciler only stores tokens and cancels subscriptions.
 */
export interface SubscriptionGateway {
  savePaymentToken(orderId: number, token: StoredPaymentToken): Promise<void>;

  findSubscriptionsForOrder(orderId: number): Promise<LinkedSubscription[]>;

  /**
   * Returns false when the subscription could not be cancelled
   */
  cancelSubscription(subscriptionId: string, note: string): Promise<boolean>;
}
