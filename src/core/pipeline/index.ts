/**
 * Inbound payment callback pipeline:
 * 1. Parse - Decode the JSON body
 * 2. Verification - Check the HMAC signature
 * 3. Normalization - Map to PaymentEvent and derive the EventKey
 * 4. Reconciliation - Apply to the order under its lock
 */

// Main processor
export { WebhookProcessor } from './webhook-processor';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { ParseStage } from './stages/parse.stage';
export { VerificationStage } from './stages/verification.stage';
export { NormalizationStage } from './stages/normalization.stage';
export { ReconciliationStage } from './stages/reconciliation.stage';
