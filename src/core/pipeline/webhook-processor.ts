import { v4 as uuidv4 } from 'uuid';
import {
  PipelineConfig,
  PipelineStage,
  WebhookContext,
  ProcessingResult,
  ProcessingMetrics,
  PipelineError,
} from './types';
import { ParseStage } from './stages/parse.stage';
import { VerificationStage } from './stages/verification.stage';
import { NormalizationStage } from './stages/normalization.stage';
import { ReconciliationStage } from './stages/reconciliation.stage';
import { ProcessingStatus } from '../domain/enums';
import { LifecycleHooks, ReconcilerLogger } from '../interfaces';

const TIMEOUT = Symbol('timeout');

/**
 * Statuses worth a warning rather than a debug line
 */
const WARN_STATUSES = new Set<ProcessingStatus>([
  ProcessingStatus.SIGNATURE_FAILED,
  ProcessingStatus.PARSE_ERROR,
  ProcessingStatus.NORMALIZATION_FAILED,
  ProcessingStatus.UNMATCHED,
  ProcessingStatus.DUPLICATE,
  ProcessingStatus.TRANSITION_REJECTED,
]);

/**
 * WebhookProcessor runs one payment callback delivery through the pipeline
 *
 * Pipeline stages:
 * 1. Parse - JSON body
 * 2. Verification - HMAC signature
 * 3. Normalization - PaymentEvent + EventKey
 * 4. Reconciliation - apply under the order lock
 *
 * Every delivery ends with a ProcessingStatus; nothing is thrown to the
 * caller unless throwOnError is set.
 */
export class WebhookProcessor {
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;
  private readonly throwOnError: boolean;
  private readonly logErrors: boolean;
  private readonly timeoutMs: number;
  private readonly logger: ReconcilerLogger;

  constructor(private readonly config: PipelineConfig) {
    this.hooks = config.hooks;
    this.throwOnError = config.throwOnError ?? false;
    this.logErrors = config.logErrors ?? true;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.logger = config.logger ?? console;

    this.stages = this.initializeStages();
  }

  /**
   * Process a callback body through the pipeline
   */
  async processWebhook(rawBody: Buffer | string): Promise<ProcessingResult> {
    const startTime = Date.now();
    const processingId = uuidv4();

    const context: WebhookContext = {
      rawBody: typeof rawBody === 'string' ? Buffer.from(rawBody) : rawBody,
      receivedAt: new Date(),
      processingId,
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
      parsed: false,
      signatureVerified: false,
      normalized: false,
      reconciled: false,
    };

    try {
      const outcome = await this.withTimeout(
        this.executePipeline(context, metrics),
      );

      if (outcome === TIMEOUT) {
        throw new Error(`Pipeline timeout after ${this.timeoutMs}ms`);
      }

      context.processingDurationMs = Date.now() - startTime;
      metrics.totalDurationMs = context.processingDurationMs;

      const processingStatus =
        context.processingStatus ?? ProcessingStatus.PROCESSED;
      this.logFate(context, processingStatus);

      if (this.hooks?.onWebhookFate) {
        await this.hooks.onWebhookFate({
          processingId,
          processingStatus,
          orderId: context.event?.orderId,
          eventType: context.event?.rawEventType,
          eventKey: context.eventKey,
          latencyMs: context.processingDurationMs,
          error: context.error,
        });
      }

      return {
        success: !context.error,
        processingId,
        processingStatus,
        orderId: context.event?.orderId,
        eventKey: context.eventKey,
        error: context.error,
        context,
        metrics,
      };
    } catch (error) {
      context.error = error instanceof Error ? error : new Error(String(error));
      context.processingStatus = ProcessingStatus.PIPELINE_ERROR;
      context.processingDurationMs = Date.now() - startTime;
      metrics.totalDurationMs = context.processingDurationMs;

      if (this.logErrors) {
        this.logger.error(
          `Pipeline error for delivery ${processingId}: ${context.error.message}`,
          context.error.stack,
        );
      }

      if (this.hooks?.onError) {
        await this.hooks.onError(context.error, {
          operation: 'webhook-processing',
          processingId,
          orderId: context.event?.orderId,
        });
      }

      if (this.throwOnError) {
        throw new PipelineError(
          `Pipeline failed: ${context.error.message}`,
          'pipeline',
          context,
          context.error,
        );
      }

      return {
        success: false,
        processingId,
        processingStatus: ProcessingStatus.PIPELINE_ERROR,
        orderId: context.event?.orderId,
        eventKey: context.eventKey,
        error: context.error,
        context,
        metrics,
      };
    }
  }

  /**
   * Execute the pipeline stages sequentially
   */
  private async executePipeline(
    context: WebhookContext,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);

        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);
        this.updateMetrics(stage.name, result.success, metrics);

        if (!result.shouldContinue) {
          break;
        }

        if (!result.success && result.error) {
          throw result.error;
        }
      } catch (error) {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          context,
          error instanceof Error ? error : undefined,
        );
      }
    }
  }

  private initializeStages(): PipelineStage[] {
    return [
      new ParseStage(),
      new VerificationStage(this.config.signatureVerifier),
      new NormalizationStage(),
      new ReconciliationStage(this.config.orderStore, this.config.reconciler),
    ];
  }

  private updateMetrics(
    stageName: string,
    success: boolean,
    metrics: ProcessingMetrics,
  ): void {
    if (!success) return;

    switch (stageName) {
      case 'parse':
        metrics.parsed = true;
        break;
      case 'verification':
        metrics.signatureVerified = true;
        break;
      case 'normalization':
        metrics.normalized = true;
        break;
      case 'reconciliation':
        metrics.reconciled = true;
        break;
    }
  }

  /**
   * Race the pipeline against the timeout, clearing the timer either way
   */
  private async withTimeout<T>(work: Promise<T>): Promise<T | typeof TIMEOUT> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMEOUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMEOUT), this.timeoutMs);
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private logFate(context: WebhookContext, status: ProcessingStatus): void {
    const subject = context.event
      ? `order ${context.event.orderId}${context.eventKey ? ` (${context.eventKey})` : ''}`
      : `delivery ${context.processingId}`;
    const message = context.error
      ? `Webhook ${status} for ${subject}: ${context.error.message}`
      : `Webhook ${status} for ${subject}`;

    if (WARN_STATUSES.has(status)) {
      this.logger.warn(message);
    } else if (status === ProcessingStatus.PROCESSED) {
      this.logger.log(message);
    } else {
      this.logger.debug?.(message);
    }
  }
}
