import { Order } from '../domain/models';
import {
  CheckoutLineItem,
  GatewaySettings,
  OrderNotFoundError,
  OrderStore,
  ReconcilerLogger,
  SessionClient,
} from '../interfaces';
import { ReturnTokenSigner } from '../security';

export type CheckoutSettings = Pick<
  GatewaySettings,
  'manualCapture' | 'returnUrl' | 'abandonUrl'
>;

export interface CheckoutOptions {
  isSubscription?: boolean;
}

export type CheckoutResult =
  | { result: 'success'; redirectUrl: string; checkoutReference: string }
  | { result: 'failure'; reason: string };

/**
 * Append query parameters to a URL that may already carry some
 */
export function withQuery(base: string, params: Record<string, string>): string {
  const query = new URLSearchParams(params).toString();
  if (!query) {
    return base;
  }
  return `${base}${base.includes('?') ? '&' : '?'}${query}`;
}

/**
 * Hosted checkout line items in minor units. Shipping is sent as a
 * "Delivery" line and the last line absorbs rounding so the items add
 * up to the order total.
 */
export function buildLineItems(order: Order): CheckoutLineItem[] {
  const items: CheckoutLineItem[] = order.lines.map((line) => ({
    Name: line.name,
    Amount: line.total,
  }));

  if (order.shippingTotal > 0) {
    items.push({ Name: 'Delivery', Amount: order.shippingTotal });
  }

  const calculated = items.reduce((sum, item) => sum + item.Amount, 0);
  const difference = order.total - calculated;
  const last = items[items.length - 1];
  if (difference !== 0 && last) {
    last.Amount += difference;
  }

  return items;
}

/**
 * Starts a hosted checkout for an order
 */
export class CheckoutService {
  constructor(
    private readonly orderStore: OrderStore,
    private readonly sessionClient: SessionClient,
    private readonly settings: CheckoutSettings,
    private readonly returnTokens: ReturnTokenSigner,
    private readonly logger: ReconcilerLogger = console,
  ) {}

  async initiateCheckout(
    orderId: number,
    options: CheckoutOptions = {},
  ): Promise<CheckoutResult> {
    let order: Order;
    try {
      order = await this.orderStore.withOrderLock(orderId, (locked) => {
        locked.paymentState.isManualCapture = this.settings.manualCapture;
        return locked;
      });
    } catch (error) {
      if (error instanceof OrderNotFoundError) {
        this.logger.error(`Invalid order: ${orderId}`);
        return { result: 'failure', reason: 'Invalid order.' };
      }
      throw error;
    }

    const token = this.returnTokens.issue(order.id);
    if (!token) {
      this.logger.error('HMAC secret is not usable; cannot sign return URL');
      return {
        result: 'failure',
        reason: 'Payment error: Unable to initiate payment session.',
      };
    }

    const returnUrl = withQuery(this.settings.returnUrl, {
      order_id: String(order.id),
      token,
    });

    const session = await this.sessionClient.createSession(
      order.total,
      order.currency,
      returnUrl,
      order.reference,
      buildLineItems(order),
      options.isSubscription ?? false,
      this.settings.abandonUrl,
    );

    if (!session) {
      this.logger.error(
        `Payment error: Unable to initiate payment session for order ${orderId}`,
      );
      return {
        result: 'failure',
        reason: 'Payment error: Unable to initiate payment session.',
      };
    }

    await this.orderStore.withOrderLock(orderId, (locked) => {
      locked.paymentState.checkoutReference = session.checkoutReference;
    });

    this.logger.log(
      `Checkout session ${session.checkoutReference} created for order ${orderId}`,
    );

    return {
      result: 'success',
      redirectUrl: session.url,
      checkoutReference: session.checkoutReference,
    };
  }
}
