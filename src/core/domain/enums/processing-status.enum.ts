/**
 * Webhook processing outcomes - every delivery gets classified.
 * The HTTP response never varies; this is what the logs see.
 */
export enum ProcessingStatus {
  /**
   * Event applied to the order
   */
  PROCESSED = 'processed',

  /**
   * EventKey already recorded on the order
   */
  DUPLICATE = 'duplicate',

  /**
   * Processor reported a failure; a note was added
   */
  FAILURE_RECORDED = 'failure_recorded',

  /**
   * Valid event that needed no change (stale authorization or capture)
   */
  IGNORED = 'ignored',

  /**
   * Event recorded but the status change it asked for is not allowed
   */
  TRANSITION_REJECTED = 'transition_rejected',

  /**
   * Missing or wrong hmacSignature, or unusable secret
   */
  SIGNATURE_FAILED = 'signature_failed',

  /**
   * Body is not a JSON object
   */
  PARSE_ERROR = 'parse_error',

  /**
   * Signed payload lacks a usable merchantReference
   */
  NORMALIZATION_FAILED = 'normalization_failed',

  /**
   * merchantReference does not resolve to an order
   */
  UNMATCHED = 'unmatched',

  /**
   * Unexpected fault inside the pipeline
   */
  PIPELINE_ERROR = 'pipeline_error',
}
