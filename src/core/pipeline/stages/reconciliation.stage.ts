import { PipelineStage, WebhookContext, StageResult } from '../types';
import { ProcessingStatus, ReconciliationOutcome } from '../../domain/enums';
import { OrderNotFoundError, OrderStore } from '../../interfaces';
import { WebhookReconciler } from '../../services/webhook-reconciler.service';

const STATUS_BY_OUTCOME: Record<ReconciliationOutcome, ProcessingStatus> = {
  [ReconciliationOutcome.APPLIED]: ProcessingStatus.PROCESSED,
  [ReconciliationOutcome.DUPLICATE]: ProcessingStatus.DUPLICATE,
  [ReconciliationOutcome.FAILURE_NOTED]: ProcessingStatus.FAILURE_RECORDED,
  [ReconciliationOutcome.ALREADY_PAID]: ProcessingStatus.IGNORED,
  [ReconciliationOutcome.TRANSITION_REJECTED]:
    ProcessingStatus.TRANSITION_REJECTED,
};

/**
 * Stage 4: Reconciliation
 * Applies the event to its order under the order lock. The dedup check
 * and the key append happen inside that lock.
 */
export class ReconciliationStage implements PipelineStage {
  name = 'reconciliation';

  constructor(
    private readonly orderStore: OrderStore,
    private readonly reconciler: WebhookReconciler,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const startTime = Date.now();
    const event = context.event;

    if (!event) {
      context.processingStatus = ProcessingStatus.NORMALIZATION_FAILED;
      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: {
          skipped: true,
          reason: 'No normalized event',
          durationMs: Date.now() - startTime,
        },
      };
    }

    try {
      const outcome = await this.orderStore.withOrderLock(
        event.orderId,
        (order) => this.reconciler.apply(order, event),
      );

      context.reconciliationOutcome = outcome;
      context.processingStatus = STATUS_BY_OUTCOME[outcome];

      return {
        success: true,
        context,
        shouldContinue: true,
        metadata: {
          outcome,
          durationMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      if (!(error instanceof OrderNotFoundError)) {
        throw error;
      }

      context.processingStatus = ProcessingStatus.UNMATCHED;

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: {
          unmatched: true,
          reason: error.message,
          durationMs: Date.now() - startTime,
        },
      };
    }
  }
}
