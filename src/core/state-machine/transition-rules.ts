import { OrderStatus, TriggerType } from '../domain/enums';
import { OrderTransitionRule } from './types';

/**
 * Order status transitions the reconciler drives or reacts to.
 *
 * Webhook rules guard status changes caused by processor events.
 * Merchant rules name the processor command a platform status change
 * stands for; every other merchant transition is left alone.
 */
export const ORDER_TRANSITION_RULES: OrderTransitionRule[] = [
  // ============ Payment received ============

  {
    from: OrderStatus.PENDING,
    to: OrderStatus.ON_HOLD,
    triggers: [TriggerType.WEBHOOK],
    description: 'Authorized, awaiting manual capture',
  },
  {
    from: OrderStatus.PENDING,
    to: OrderStatus.PROCESSING,
    triggers: [TriggerType.WEBHOOK],
    description: 'Paid',
  },
  {
    from: OrderStatus.PENDING,
    to: OrderStatus.COMPLETED,
    triggers: [TriggerType.WEBHOOK],
    description: 'Paid, nothing to fulfil',
  },

  // A failed attempt can still be paid on retry
  {
    from: OrderStatus.FAILED,
    to: OrderStatus.ON_HOLD,
    triggers: [TriggerType.WEBHOOK],
    description: 'Authorized after a failed attempt',
  },
  {
    from: OrderStatus.FAILED,
    to: OrderStatus.PROCESSING,
    triggers: [TriggerType.WEBHOOK],
    description: 'Paid after a failed attempt',
  },
  {
    from: OrderStatus.FAILED,
    to: OrderStatus.COMPLETED,
    triggers: [TriggerType.WEBHOOK],
    description: 'Paid after a failed attempt, nothing to fulfil',
  },

  // ============ Manual capture ============

  {
    from: OrderStatus.ON_HOLD,
    to: OrderStatus.PROCESSING,
    triggers: [TriggerType.WEBHOOK, TriggerType.MERCHANT],
    command: 'capture',
    description: 'Authorization captured',
  },
  {
    from: OrderStatus.ON_HOLD,
    to: OrderStatus.COMPLETED,
    triggers: [TriggerType.WEBHOOK, TriggerType.MERCHANT],
    command: 'capture',
    description: 'Authorization captured, nothing to fulfil',
  },
  {
    from: OrderStatus.ON_HOLD,
    to: OrderStatus.CANCELLED,
    triggers: [TriggerType.MERCHANT],
    command: 'reverse',
    description: 'Authorization cancelled by merchant',
  },

  // ============ Refunds ============

  {
    from: OrderStatus.PROCESSING,
    to: OrderStatus.REFUNDED,
    triggers: [TriggerType.MERCHANT],
    command: 'refund',
    description: 'Refunded by merchant',
  },
  {
    from: OrderStatus.COMPLETED,
    to: OrderStatus.REFUNDED,
    triggers: [TriggerType.MERCHANT],
    command: 'refund',
    description: 'Refunded by merchant',
  },
];

/**
 * Statuses no processor event may move an order out of
 */
export function getTerminalStatuses(): OrderStatus[] {
  return [OrderStatus.CANCELLED, OrderStatus.REFUNDED];
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return getTerminalStatuses().includes(status);
}

/**
 * Find a specific transition rule
 */
export function findTransitionRule(
  from: OrderStatus,
  to: OrderStatus,
  rules: OrderTransitionRule[] = ORDER_TRANSITION_RULES,
): OrderTransitionRule | undefined {
  return rules.find((rule) => rule.from === from && rule.to === to);
}
