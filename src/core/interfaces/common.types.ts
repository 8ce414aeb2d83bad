import type { LoggerService } from '@nestjs/common';
import type { ProcessingStatus } from '../domain/enums';

/**
 * Decoded JSON object as received on the wire
 */
export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Logger accepted by core classes. Nest's `Logger` satisfies it.
 */
export type ReconcilerLogger = Pick<LoggerService, 'log' | 'warn' | 'error'> &
  Partial<Pick<LoggerService, 'debug'>>;

/**
 * Line item as the hosted checkout expects it
 */
export interface CheckoutLineItem {
  Name: string;
  /**
   * Minor units, tax included
   */
  Amount: number;
}

/**
 * Emitted once per webhook delivery after its fate is known
 */
export interface WebhookFateEvent {
  processingId: string;
  processingStatus: ProcessingStatus;
  orderId?: number;
  eventType?: string;
  eventKey?: string;
  latencyMs: number;
  error?: Error;
}

/**
 * Observability hooks for the inbound pipeline
 */
export interface LifecycleHooks {
  onWebhookFate?: (event: WebhookFateEvent) => void | Promise<void>;
  onError?: (
    error: Error,
    context: { operation: string; processingId: string; orderId?: number },
  ) => void | Promise<void>;
}

/**
 * Raised when a signed payload cannot be mapped onto a PaymentEvent
 */
export class NormalizationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'NormalizationError';
  }
}

/**
 * Raised by order stores when an order id does not resolve
 */
export class OrderNotFoundError extends Error {
  constructor(public readonly orderId: number) {
    super(`Order ${orderId} not found`);
    this.name = 'OrderNotFoundError';
  }
}
