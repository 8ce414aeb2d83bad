/**
 * What the reconciler did with one event
 */
export enum ReconciliationOutcome {
  APPLIED = 'applied',
  DUPLICATE = 'duplicate',
  FAILURE_NOTED = 'failure_noted',
  ALREADY_PAID = 'already_paid',
  TRANSITION_REJECTED = 'transition_rejected',
}
