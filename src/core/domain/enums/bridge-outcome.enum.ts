/**
 * Result of reacting to a merchant status change
 */
export enum BridgeOutcomeStatus {
  /**
   * Processor accepted the command; confirmation arrives by webhook
   */
  REQUESTED = 'requested',

  /**
   * Processor call failed; a failure note was added
   */
  FAILED = 'failed',

  /**
   * Order has no processor reference; an error note was added
   */
  MISSING_REFERENCE = 'missing_reference',

  /**
   * Transition maps to no processor command
   */
  IGNORED = 'ignored',

  /**
   * Stored status is not the reported origin (a replayed or out-of-date
   * notification); nothing was sent
   */
  STALE = 'stale',

  UNKNOWN_ORDER = 'unknown_order',
}
