import {
  PipelineStage,
  WebhookContext,
  StageResult,
  SignatureVerificationError,
} from '../types';
import { ProcessingStatus } from '../../domain/enums';
import { readText } from '../../domain/models';
import { SignatureVerifier } from '../../security';

/**
 * Stage 2: Signature Verification
 * Nothing past this stage sees an unsigned payload
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';

  constructor(private readonly signatureVerifier: SignatureVerifier) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const startTime = Date.now();
    const payload = context.payload ?? {};

    const isValid = this.signatureVerifier.verify(
      payload,
      payload.hmacSignature,
    );
    context.signatureValid = isValid;

    if (!isValid) {
      const error = new SignatureVerificationError(
        'Invalid HMAC signature for webhook',
        readText(payload, 'merchantReference'),
      );
      context.signatureError = error.message;
      context.processingStatus = ProcessingStatus.SIGNATURE_FAILED;
      context.error = error;

      return {
        success: false,
        context,
        error,
        shouldContinue: false,
        metadata: {
          signatureFailed: true,
          durationMs: Date.now() - startTime,
        },
      };
    }

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        durationMs: Date.now() - startTime,
      },
    };
  }
}
