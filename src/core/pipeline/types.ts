import {
  OrderStore,
  LifecycleHooks,
  JsonObject,
  ReconcilerLogger,
} from '../interfaces';
import { PaymentEvent } from '../domain/models';
import { ProcessingStatus, ReconciliationOutcome } from '../domain/enums';
import { SignatureVerifier } from '../security';
import { WebhookReconciler } from '../services/webhook-reconciler.service';

/**
 * Webhook processing context passed through the pipeline
 */
export interface WebhookContext {
  // Raw input
  rawBody: Buffer;
  receivedAt: Date;

  // Processing metadata
  processingId: string;

  // Parsed body
  payload?: JsonObject;

  // Verification results
  signatureValid?: boolean;
  signatureError?: string;

  // Normalized data
  event?: PaymentEvent;
  eventKey?: string;
  normalizationError?: string;

  // Reconciliation
  reconciliationOutcome?: ReconciliationOutcome;

  // Processing outcome
  processingStatus?: ProcessingStatus;
  error?: Error;

  // Metrics
  processingDurationMs?: number;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: WebhookContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: WebhookContext): Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  orderStore: OrderStore;
  signatureVerifier: SignatureVerifier;
  reconciler: WebhookReconciler;

  // Lifecycle hooks
  hooks?: LifecycleHooks;

  // Error handling
  throwOnError?: boolean;
  logErrors?: boolean;
  logger?: ReconcilerLogger;

  // Performance
  timeoutMs?: number;
}

/**
 * Processing result returned by the pipeline
 */
export interface ProcessingResult {
  success: boolean;
  processingId: string;
  processingStatus: ProcessingStatus;
  orderId?: number;
  eventKey?: string;
  error?: Error;
  context: WebhookContext;
  metrics: ProcessingMetrics;
}

/**
 * Processing metrics
 */
export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
  parsed: boolean;
  signatureVerified: boolean;
  normalized: boolean;
  reconciled: boolean;
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public stage: string,
    public context: WebhookContext,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Signature verification error
 */
export class SignatureVerificationError extends Error {
  constructor(
    message: string,
    public merchantReference?: string,
  ) {
    super(message);
    this.name = 'SignatureVerificationError';
  }
}
