import { BridgeOutcomeStatus, OrderStatus } from '../domain/enums';
import { Order } from '../domain/models';
import { formatAmount } from '../domain/value-objects/money.vo';
import {
  LinkedSubscription,
  OrderNotFoundError,
  OrderStore,
  ReconcilerLogger,
  SessionClient,
  SubscriptionGateway,
} from '../interfaces';
import { OrderStateMachine, ProcessorCommand } from '../state-machine';

export interface BridgeOutcome {
  orderId: number;
  status: BridgeOutcomeStatus;
  command?: ProcessorCommand;
  /**
   * Subscriptions cancelled after a successful refund
   */
  cancelledSubscriptions?: string[];
}

/**
 * What the outbound call needs, copied out of the locked order
 */
interface CommandTarget {
  payfacReference: string;
  reference: string;
  amount: number;
  currency: string;
}

type Prepared =
  | { kind: 'ready'; target: CommandTarget }
  | { kind: 'stale' }
  | { kind: 'missing-reference' };

const COMMAND_LABELS: Record<ProcessorCommand, string> = {
  capture: 'capture',
  reverse: 'cancel',
  refund: 'refund',
};

/**
 * Turns merchant status changes into processor commands.
 *
 * Each transition runs in three steps. Under the order lock the stored
 * status is checked against the reported origin, moved to the new status
 * and the request flag raised. The processor is then called with no lock
 * held, and the result is noted under the lock again. Request flags
 * are never lowered here; the webhook reconciler clears them when the
 * confirming event arrives.
 */
export class OrderLifecycleBridge {
  constructor(
    private readonly orderStore: OrderStore,
    private readonly sessionClient: SessionClient,
    private readonly subscriptions?: SubscriptionGateway,
    private readonly stateMachine: OrderStateMachine = new OrderStateMachine(),
    private readonly logger: ReconcilerLogger = console,
  ) {}

  async handleStatusTransition(
    orderId: number,
    from: OrderStatus,
    to: OrderStatus,
  ): Promise<BridgeOutcome> {
    const command = this.stateMachine.commandFor(from, to);
    if (!command) {
      this.logger.debug?.(
        `No processor command for ${from} -> ${to} on order ${orderId}`,
      );
      return { orderId, status: BridgeOutcomeStatus.IGNORED };
    }

    let prepared: Prepared;
    try {
      prepared = await this.orderStore.withOrderLock(orderId, (order) =>
        this.prepare(order, from, to, command),
      );
    } catch (error) {
      if (error instanceof OrderNotFoundError) {
        this.logger.warn(`Order ${orderId} not found for ${command}`);
        return { orderId, command, status: BridgeOutcomeStatus.UNKNOWN_ORDER };
      }
      throw error;
    }

    if (prepared.kind === 'stale') {
      return { orderId, command, status: BridgeOutcomeStatus.STALE };
    }
    if (prepared.kind === 'missing-reference') {
      return {
        orderId,
        command,
        status: BridgeOutcomeStatus.MISSING_REFERENCE,
      };
    }

    const { target } = prepared;
    switch (command) {
      case 'reverse':
        return this.cancel(orderId, target);
      case 'capture':
        return this.capture(orderId, target);
      case 'refund':
        return this.refund(orderId, target);
    }
  }

  /**
   * Runs under the lock. The stored status must still be `from`; it is
   * moved to `to` here, so a repeated notification finds nothing to do.
   */
  private prepare(
    order: Order,
    from: OrderStatus,
    to: OrderStatus,
    command: ProcessorCommand,
  ): Prepared {
    if (order.status !== from) {
      this.logger.warn(
        `Order ${order.id} is ${order.status}, not ${from}; ${command} not sent`,
      );
      return { kind: 'stale' };
    }

    const state = order.paymentState;
    const label = COMMAND_LABELS[command];

    if (!state.hasProcessorReference()) {
      order.updateStatus(
        to,
        `Unable to ${label} the payment: no processor reference is recorded on this order.`,
      );
      this.logger.warn(
        `Order ${order.id} has no processor reference; ${command} not sent`,
      );
      return { kind: 'missing-reference' };
    }

    if (command === 'reverse') {
      state.cancelRequested = true;
    } else if (command === 'refund') {
      state.refundRequested = true;
    }

    order.updateStatus(
      to,
      `Status changed by the merchant; sending ${label} to the processor.`,
    );

    return {
      kind: 'ready',
      target: {
        payfacReference: state.payfacReference,
        reference: order.reference,
        amount: order.total,
        currency: order.currency,
      },
    };
  }

  private async cancel(
    orderId: number,
    target: CommandTarget,
  ): Promise<BridgeOutcome> {
    const accepted = await this.sessionClient.reverse(
      target.reference,
      target.payfacReference,
    );

    await this.note(
      orderId,
      accepted
        ? `Cancellation requested. Reference: ${target.payfacReference}.`
        : `Cancellation request failed. Reference: ${target.payfacReference}.`,
    );

    return this.outcome(orderId, 'reverse', accepted);
  }

  private async capture(
    orderId: number,
    target: CommandTarget,
  ): Promise<BridgeOutcome> {
    const response = await this.sessionClient.capture(
      target.payfacReference,
      target.reference,
      target.amount,
      target.currency,
    );
    const displayAmount = formatAmount(target.amount, target.currency);

    await this.note(
      orderId,
      response
        ? `Capture of ${displayAmount} requested. Reference: ${target.payfacReference}.`
        : `Capture of ${displayAmount} failed. Reference: ${target.payfacReference}.`,
    );

    return this.outcome(orderId, 'capture', response !== null);
  }

  private async refund(
    orderId: number,
    target: CommandTarget,
  ): Promise<BridgeOutcome> {
    const response = await this.sessionClient.refund(
      target.payfacReference,
      target.reference,
      target.amount,
      target.currency,
    );
    const displayAmount = formatAmount(target.amount, target.currency);

    if (!response) {
      await this.note(
        orderId,
        `Refund of ${displayAmount} failed. Reference: ${target.payfacReference}.`,
      );
      return this.outcome(orderId, 'refund', false);
    }

    await this.note(
      orderId,
      `Refund of ${displayAmount} requested. Reference: ${target.payfacReference}.`,
    );

    const cancelled = await this.cancelSubscriptions(orderId, target.reference);

    return {
      ...this.outcome(orderId, 'refund', true),
      cancelledSubscriptions: cancelled,
    };
  }

  /**
   * Gateway failures become notes; the refund has already been accepted
   */
  private async cancelSubscriptions(
    orderId: number,
    reference: string,
  ): Promise<string[]> {
    const cancelled: string[] = [];
    const gateway = this.subscriptions;
    if (!gateway) {
      return cancelled;
    }

    let linked: LinkedSubscription[];
    try {
      linked = await gateway.findSubscriptionsForOrder(orderId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Subscription lookup failed for order ${orderId}: ${message}`,
      );
      await this.note(
        orderId,
        `Linked subscriptions could not be cancelled: ${message}.`,
      );
      return cancelled;
    }

    const notes: string[] = [];
    for (const subscription of linked) {
      let ok = false;
      try {
        ok = await gateway.cancelSubscription(
          subscription.id,
          `Cancelled after refund of order ${reference}.`,
        );
      } catch (error) {
        this.logger.error(
          `Cancelling subscription ${subscription.id} failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }

      if (ok) {
        cancelled.push(subscription.id);
        notes.push(`Subscription ${subscription.id} cancelled after refund.`);
      } else {
        notes.push(`Subscription ${subscription.id} could not be cancelled.`);
      }
    }

    if (notes.length > 0) {
      await this.note(orderId, ...notes);
    }
    return cancelled;
  }

  private async note(orderId: number, ...messages: string[]): Promise<void> {
    await this.orderStore.withOrderLock(orderId, (order) => {
      for (const message of messages) {
        order.addNote(message);
      }
    });
  }

  private outcome(
    orderId: number,
    command: ProcessorCommand,
    accepted: boolean,
  ): BridgeOutcome {
    if (!accepted) {
      this.logger.error(`Processor rejected ${command} for order ${orderId}`);
    } else {
      this.logger.log(`Processor accepted ${command} for order ${orderId}`);
    }

    return {
      orderId,
      command,
      status: accepted
        ? BridgeOutcomeStatus.REQUESTED
        : BridgeOutcomeStatus.FAILED,
    };
  }
}
