import { PipelineStage, WebhookContext, StageResult } from '../types';
import { ProcessingStatus } from '../../domain/enums';
import { isJsonObject } from '../../interfaces';

/**
 * Stage 1: Parse
 * Decodes the raw body into a JSON object
 */
export class ParseStage implements PipelineStage {
  name = 'parse';

  async execute(context: WebhookContext): Promise<StageResult> {
    const startTime = Date.now();

    let decoded: unknown;
    try {
      decoded = JSON.parse(context.rawBody.toString('utf8'));
    } catch (error) {
      return this.reject(
        context,
        `Failed to parse webhook payload: ${error instanceof Error ? error.message : String(error)}`,
        startTime,
      );
    }

    if (!isJsonObject(decoded)) {
      return this.reject(
        context,
        'Webhook payload is not a JSON object',
        startTime,
      );
    }

    context.payload = decoded;

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        durationMs: Date.now() - startTime,
      },
    };
  }

  private reject(
    context: WebhookContext,
    message: string,
    startTime: number,
  ): StageResult {
    const error = new Error(message);
    context.processingStatus = ProcessingStatus.PARSE_ERROR;
    context.error = error;

    return {
      success: false,
      context,
      error,
      shouldContinue: false,
      metadata: {
        durationMs: Date.now() - startTime,
      },
    };
  }
}
