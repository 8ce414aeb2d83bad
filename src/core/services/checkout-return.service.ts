import {
  GatewaySettings,
  OrderNotFoundError,
  OrderStore,
  ReconcilerLogger,
  SessionClient,
} from '../interfaces';
import { ReturnTokenSigner } from '../security';
import { withQuery } from './checkout.service';

export type ReturnSettings = Pick<
  GatewaySettings,
  'successUrl' | 'abandonUrl' | 'cartUrl'
>;

export interface ReturnRequest {
  orderId: number;
  token?: string;
  checkoutReference?: string;
}

export type ReturnDecision =
  | { kind: 'forbidden' }
  | {
      kind: 'redirect';
      reason: 'success' | 'retry' | 'cart';
      url: string;
      /**
       * Shopper-facing message
       */
      notice?: string;
    };

/**
 * Handles the shopper coming back from the hosted checkout.
 *
 * Only records what it discovers; order status is left to the webhook.
 */
export class CheckoutReturnService {
  constructor(
    private readonly orderStore: OrderStore,
    private readonly sessionClient: SessionClient,
    private readonly settings: ReturnSettings,
    private readonly returnTokens: ReturnTokenSigner,
    private readonly logger: ReconcilerLogger = console,
  ) {}

  async handleReturn(request: ReturnRequest): Promise<ReturnDecision> {
    const { orderId } = request;

    if (!this.returnTokens.verify(orderId, request.token)) {
      this.logger.warn(`Return token verification failed for order ${orderId}`);
      return { kind: 'forbidden' };
    }

    let checkoutReference: string;
    try {
      checkoutReference = await this.orderStore.withOrderLock(
        orderId,
        (order) => {
          const state = order.paymentState;
          const fromQuery = request.checkoutReference?.trim() ?? '';
          if (fromQuery && !state.checkoutReference) {
            state.checkoutReference = fromQuery;
          }
          return fromQuery || state.checkoutReference;
        },
      );
    } catch (error) {
      if (error instanceof OrderNotFoundError) {
        return { kind: 'redirect', reason: 'cart', url: this.settings.cartUrl };
      }
      throw error;
    }

    if (!checkoutReference) {
      return this.retry(orderId);
    }

    const status = await this.sessionClient.getStatus(checkoutReference);
    if (!status) {
      await this.orderStore.withOrderLock(orderId, (order) => {
        order.addNote('Unable to fetch payment status from the processor.');
      });
      return this.retry(
        orderId,
        'There was an issue retrieving your payment status. Please try again.',
      );
    }

    const { payfacReference } = status;
    if (!payfacReference) {
      return this.retry(
        orderId,
        'Your payment session has not completed. Please try again.',
      );
    }

    await this.orderStore.withOrderLock(orderId, (order) => {
      order.paymentState.payfacReference = payfacReference;
      order.addNote(
        `Payment pending, awaiting payment confirmation. Reference: ${payfacReference}`,
      );
    });

    this.logger.log(
      `Shopper returned for order ${orderId} with reference ${payfacReference}`,
    );

    return {
      kind: 'redirect',
      reason: 'success',
      url: withQuery(this.settings.successUrl || this.settings.cartUrl, {
        order_id: String(orderId),
      }),
      notice:
        'Thank you for your order! Your payment is currently being processed.',
    };
  }

  private retry(orderId: number, notice?: string): ReturnDecision {
    const base = this.settings.abandonUrl || this.settings.cartUrl;
    return {
      kind: 'redirect',
      reason: 'retry',
      url: withQuery(base, { order_id: String(orderId) }),
      notice,
    };
  }
}
