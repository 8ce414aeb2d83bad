import { OrderStatus, TriggerType } from '../domain/enums';

/**
 * Outbound processor command a merchant transition maps to
 */
export type ProcessorCommand = 'capture' | 'reverse' | 'refund';

/**
 * Order status transition definition
 */
export interface OrderTransitionRule {
  from: OrderStatus;
  to: OrderStatus;
  triggers: TriggerType[];
  /**
   * Command sent to the processor when a merchant makes this transition
   */
  command?: ProcessorCommand;
  description: string;
}

/**
 * Transition result
 */
export interface TransitionResult {
  allowed: boolean;
  fromStatus: OrderStatus;
  toStatus: OrderStatus;
  /**
   * Target equals the current status; nothing to move
   */
  unchanged: boolean;
  reason?: string;
  rule?: OrderTransitionRule;
}
