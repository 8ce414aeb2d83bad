/**
 * Event types the processor reports in `additionalData.eventType`
 */
export enum PaymentEventType {
  AUTHORIZATION = 'authorization',
  CAPTURE = 'capture',
  REFUND = 'refund',
  TOKENIZATION = 'tokenization',
  UNKNOWN = 'unknown',
}

export function toPaymentEventType(raw: string): PaymentEventType {
  switch (raw) {
    case PaymentEventType.AUTHORIZATION:
      return PaymentEventType.AUTHORIZATION;
    case PaymentEventType.CAPTURE:
      return PaymentEventType.CAPTURE;
    case PaymentEventType.REFUND:
      return PaymentEventType.REFUND;
    case PaymentEventType.TOKENIZATION:
      return PaymentEventType.TOKENIZATION;
    default:
      return PaymentEventType.UNKNOWN;
  }
}
