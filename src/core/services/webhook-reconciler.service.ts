import {
  OrderStatus,
  PaymentEventType,
  ReconciliationOutcome,
  TriggerType,
} from '../domain/enums';
import { Order, PaymentEvent, StoredPaymentToken } from '../domain/models';
import { deriveEventKey } from '../domain/value-objects/event-key.vo';
import { formatAmount } from '../domain/value-objects/money.vo';
import {
  GatewaySettings,
  ReconcilerLogger,
  SubscriptionGateway,
} from '../interfaces';
import { OrderStateMachine } from '../state-machine';

export type ReconcilerSettings = Pick<GatewaySettings, 'completeOnPayment'>;

const DEFAULT_FAILURE_REASON = 'Transaction failed';

/**
 * Notes for failure reasons the processor is known to send
 */
const KNOWN_FAILURE_NOTES: Record<string, (reference: string) => string> = {
  Refused: (reference) =>
    `Payment was refused by the card issuer. Reference: ${reference}`,
  'Expired Card': (reference) =>
    `Payment failed because the card has expired. Reference: ${reference}`,
  '3D Not Authenticated': (reference) =>
    `Payment failed because 3-D Secure authentication was not completed. Reference: ${reference}`,
};

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * "**** 1111" from whatever card text the processor sent
 */
export function maskCard(cardText: string): string {
  const digits = cardText.replace(/\D/g, '');
  return digits.length >= 4 ? `**** ${digits.slice(-4)}` : '****';
}

/**
 * Applies verified processor events to orders.
 *
 * Stateless: every call gets the order (already loaded under the store's
 * per-order lock) and the event. The caller persists the order afterwards.
 */
export class WebhookReconciler {
  constructor(
    private readonly settings: ReconcilerSettings,
    private readonly subscriptions?: SubscriptionGateway,
    private readonly stateMachine: OrderStateMachine = new OrderStateMachine(),
    private readonly logger: ReconcilerLogger = console,
  ) {}

  async apply(order: Order, event: PaymentEvent): Promise<ReconciliationOutcome> {
    if (!event.success) {
      order.addNote(this.failureNote(event));
      this.logger.log(
        `Recorded ${event.rawEventType} failure for order ${order.id}`,
      );
      return ReconciliationOutcome.FAILURE_NOTED;
    }

    const eventKey = deriveEventKey(event);
    const state = order.paymentState;

    if (!state.recordEvent(eventKey, event.raw)) {
      this.logger.warn(
        `Duplicate event key '${eventKey}' for order ${order.id} - skipping`,
      );
      return ReconciliationOutcome.DUPLICATE;
    }

    const displayAmount = formatAmount(event.amount, event.currency);

    switch (event.eventType) {
      case PaymentEventType.AUTHORIZATION:
        return this.applyAuthorization(order, event, eventKey, displayAmount);

      case PaymentEventType.CAPTURE:
        return this.applyCapture(order, event, eventKey, displayAmount);

      case PaymentEventType.REFUND:
        this.applyRefund(order, event, displayAmount);
        return ReconciliationOutcome.APPLIED;

      case PaymentEventType.TOKENIZATION:
        await this.applyTokenization(order, event);
        return ReconciliationOutcome.APPLIED;

      case PaymentEventType.UNKNOWN:
        order.addNote(
          `Unknown payment event type received: ${event.rawEventType}.`,
        );
        return ReconciliationOutcome.APPLIED;
    }
  }

  /**
   * Status an order moves to once its money is collected
   */
  paidStatusFor(order: Order): OrderStatus {
    return this.settings.completeOnPayment || !order.needsProcessing
      ? OrderStatus.COMPLETED
      : OrderStatus.PROCESSING;
  }

  private applyAuthorization(
    order: Order,
    event: PaymentEvent,
    eventKey: string,
    displayAmount: string,
  ): ReconciliationOutcome {
    if (order.isPaid()) {
      this.logger.log(
        `Order ${order.id} already ${order.status}; ignoring authorization ${event.payfacReference}`,
      );
      return ReconciliationOutcome.ALREADY_PAID;
    }

    const state = order.paymentState;
    if (!state.payfacReference && event.payfacReference) {
      state.payfacReference = event.payfacReference;
    }
    if (!state.checkoutReference && event.checkoutReference) {
      state.checkoutReference = event.checkoutReference;
    }

    const threeDText = event.threeDAuthenticated
      ? 'verified by 3D Secure'
      : 'not verified by 3D Secure';
    const summary =
      `${displayAmount} was successfully authorized to card ${event.cardNumber}, ${threeDText}.\n` +
      `Auth code is ${event.authCode}.\n\n`;

    if (state.isManualCapture) {
      return this.moveTo(
        order,
        OrderStatus.ON_HOLD,
        `${summary}This authorization can be cancelled or captured.`,
        eventKey,
      );
    }

    return this.moveTo(
      order,
      this.paidStatusFor(order),
      `${summary}This transaction has been captured and can be refunded if needed.`,
      eventKey,
    );
  }

  private applyCapture(
    order: Order,
    event: PaymentEvent,
    eventKey: string,
    displayAmount: string,
  ): ReconciliationOutcome {
    if (order.isPaid()) {
      this.logger.log(
        `Order ${order.id} already ${order.status}; ignoring capture ${event.payfacReference}`,
      );
      return ReconciliationOutcome.ALREADY_PAID;
    }

    return this.moveTo(
      order,
      this.paidStatusFor(order),
      `Manual capture completed for ${displayAmount}. Reference: ${event.payfacReference}.`,
      eventKey,
    );
  }

  /**
   * Refund events do not say whether they confirm a refund or a
   * cancellation; the request flag raised by the merchant action decides.
   */
  private applyRefund(
    order: Order,
    event: PaymentEvent,
    displayAmount: string,
  ): void {
    const state = order.paymentState;

    if (state.refundRequested) {
      order.addNote(
        `A refund amount of ${displayAmount} has been processed. Reference: ${event.payfacReference}`,
      );
      state.refundRequested = false;
      return;
    }

    if (state.cancelRequested) {
      order.addNote(
        `Cancellation confirmed. Reference: ${event.payfacReference}.`,
      );
      state.cancelRequested = false;
      return;
    }

    order.addNote(`Refund/cancellation ${displayAmount} (unknown type)`);
  }

  private async applyTokenization(
    order: Order,
    event: PaymentEvent,
  ): Promise<void> {
    if (!event.token) {
      order.addNote('Tokenization event received without a token.');
      return;
    }

    const token: StoredPaymentToken = {
      token: event.token,
      cardSummary: maskCard(event.cardSummary || event.cardNumber),
      payfacReference: event.payfacReference,
      savedAt: new Date().toISOString(),
    };

    order.paymentState.paymentToken = token;
    if (this.subscriptions) {
      await this.subscriptions.savePaymentToken(order.id, token);
    }

    order.addNote(
      `Card ${token.cardSummary} saved for future payments. Reference: ${event.payfacReference}`,
    );
  }

  private moveTo(
    order: Order,
    target: OrderStatus,
    note: string,
    eventKey: string,
  ): ReconciliationOutcome {
    const result = this.stateMachine.validateTransition(
      order.status,
      target,
      TriggerType.WEBHOOK,
    );

    if (!result.allowed) {
      this.logger.warn(
        `Rejected ${order.status} -> ${target} for order ${order.id}: ${result.reason}`,
      );
      order.addNote(
        `Payment event ${eventKey} was not applied: ${result.reason}.`,
      );
      return ReconciliationOutcome.TRANSITION_REJECTED;
    }

    order.updateStatus(target, note);
    this.logger.log(`Order ${order.id} moved to ${target} by ${eventKey}`);
    return ReconciliationOutcome.APPLIED;
  }

  private failureNote(event: PaymentEvent): string {
    const known = event.reason ? KNOWN_FAILURE_NOTES[event.reason] : undefined;
    if (known) {
      return known(event.payfacReference);
    }

    return `${capitalize(event.rawEventType)} failed: ${event.reason || DEFAULT_FAILURE_REASON}. Reference: ${event.payfacReference}`;
  }
}
