import { OrderStatus, TriggerType } from '../domain/enums';
import {
  OrderTransitionRule,
  ProcessorCommand,
  TransitionResult,
} from './types';
import {
  ORDER_TRANSITION_RULES,
  findTransitionRule,
  isTerminalStatus,
} from './transition-rules';

/**
 * Order state machine - validates status changes against the rule table
 */
export class OrderStateMachine {
  constructor(
    private readonly rules: OrderTransitionRule[] = ORDER_TRANSITION_RULES,
  ) {}

  /**
   * Validate a status change. Moving to the current status is always
   * allowed and reported as unchanged.
   */
  validateTransition(
    from: OrderStatus,
    to: OrderStatus,
    trigger: TriggerType,
  ): TransitionResult {
    if (from === to) {
      return { allowed: true, fromStatus: from, toStatus: to, unchanged: true };
    }

    if (trigger === TriggerType.WEBHOOK && isTerminalStatus(from)) {
      return {
        allowed: false,
        fromStatus: from,
        toStatus: to,
        unchanged: false,
        reason: `Cannot transition from terminal status: ${from}`,
      };
    }

    const rule = findTransitionRule(from, to, this.rules);
    if (!rule) {
      return {
        allowed: false,
        fromStatus: from,
        toStatus: to,
        unchanged: false,
        reason: `Transition from ${from} to ${to} is not defined`,
      };
    }

    if (!rule.triggers.includes(trigger)) {
      return {
        allowed: false,
        fromStatus: from,
        toStatus: to,
        unchanged: false,
        reason: `Trigger type ${trigger} is not valid for transition from ${from} to ${to}`,
        rule,
      };
    }

    return {
      allowed: true,
      fromStatus: from,
      toStatus: to,
      unchanged: false,
      rule,
    };
  }

  /**
   * Processor command behind a merchant status change, if any
   */
  commandFor(from: OrderStatus, to: OrderStatus): ProcessorCommand | undefined {
    const result = this.validateTransition(from, to, TriggerType.MERCHANT);
    return result.allowed ? result.rule?.command : undefined;
  }
}
