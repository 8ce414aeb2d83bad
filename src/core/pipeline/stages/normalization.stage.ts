import { PipelineStage, WebhookContext, StageResult } from '../types';
import { ProcessingStatus } from '../../domain/enums';
import { normalizePaymentEvent } from '../../domain/models';
import { deriveEventKey } from '../../domain/value-objects/event-key.vo';
import { NormalizationError } from '../../interfaces';

/**
 * Stage 3: Normalization
 * Maps the signed payload onto a PaymentEvent and derives its EventKey
 */
export class NormalizationStage implements PipelineStage {
  name = 'normalization';

  async execute(context: WebhookContext): Promise<StageResult> {
    const startTime = Date.now();

    try {
      const event = normalizePaymentEvent(context.payload ?? {});
      context.event = event;
      context.eventKey = deriveEventKey(event);

      return {
        success: true,
        context,
        shouldContinue: true,
        metadata: {
          eventType: event.eventType,
          durationMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      if (!(error instanceof NormalizationError)) {
        throw error;
      }

      context.normalizationError = error.message;
      context.processingStatus = ProcessingStatus.NORMALIZATION_FAILED;
      context.error = error;

      return {
        success: false,
        context,
        error,
        shouldContinue: false,
        metadata: {
          field: error.field,
          durationMs: Date.now() - startTime,
        },
      };
    }
  }
}
