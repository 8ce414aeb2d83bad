import { PaymentEventType, toPaymentEventType } from '../enums';
import {
  JsonObject,
  NormalizationError,
  isJsonObject,
} from '../../interfaces/common.types';

/**
 * One decoded processor notification
 */
export interface PaymentEvent {
  /**
   * Order identity as sent by the processor
   */
  merchantReference: string;
  orderId: number;
  checkoutReference: string;
  payfacReference: string;
  eventType: PaymentEventType;
  /**
   * Lower-cased type string as received; `unknown` when absent
   */
  rawEventType: string;
  originalPayfacReference: string;
  amount: number;
  currency: string;
  success: boolean;
  reason?: string;
  authCode: string;
  cardNumber: string;
  cardSummary: string;
  threeDAuthenticated: boolean;
  token?: string;
  hmacSignature: string;
  raw: JsonObject;
}

/**
 * Read a scalar field as text. Numbers and booleans are stringified,
 * anything else counts as absent.
 */
export function readText(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

function readFlag(source: JsonObject, key: string): boolean | undefined {
  const value = source[key];
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return value.trim().toLowerCase() === 'true';
  }
  return undefined;
}

function readMinorUnits(source: JsonObject): number {
  const value = source.amount;
  const parsed =
    typeof value === 'number'
      ? Math.trunc(value)
      : typeof value === 'string'
        ? parseInt(value, 10)
        : NaN;

  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

function parseOrderId(merchantReference: string | undefined): number {
  if (!merchantReference || !/^\s*\d+\s*$/.test(merchantReference)) {
    throw new NormalizationError(
      `merchantReference is not an order id: ${merchantReference ?? '(missing)'}`,
      'merchantReference',
    );
  }

  const orderId = parseInt(merchantReference, 10);
  if (orderId <= 0) {
    throw new NormalizationError(
      `merchantReference must be positive: ${merchantReference}`,
      'merchantReference',
    );
  }

  return orderId;
}

/**
 * Map a decoded callback body onto a PaymentEvent.
 * Only a missing or non-numeric merchantReference is fatal.
 */
export function normalizePaymentEvent(payload: JsonObject): PaymentEvent {
  const additional = isJsonObject(payload.additionalData)
    ? payload.additionalData
    : {};

  const merchantReference = readText(payload, 'merchantReference');
  const orderId = parseOrderId(merchantReference);

  const rawEventType = (
    readText(additional, 'eventType') ??
    readText(payload, 'eventType') ??
    'unknown'
  )
    .trim()
    .toLowerCase();

  const success = readText(payload, 'success');

  return {
    merchantReference: merchantReference?.trim() ?? '',
    orderId,
    checkoutReference: readText(payload, 'checkoutReference') ?? '',
    payfacReference: readText(payload, 'payfacReference') ?? '',
    eventType: toPaymentEventType(rawEventType),
    rawEventType: rawEventType || 'unknown',
    originalPayfacReference:
      readText(additional, 'originalPayfacReference') ?? '',
    amount: readMinorUnits(payload),
    currency: readText(payload, 'currency') ?? '',
    success: success === undefined || success.trim().toLowerCase() !== 'false',
    reason: readText(payload, 'reason'),
    authCode: readText(additional, 'authCode') ?? '',
    cardNumber: readText(additional, 'cardNumber') ?? '',
    cardSummary: readText(additional, 'cardSummary') ?? '',
    threeDAuthenticated: readFlag(additional, 'threeDAuthenticated') ?? false,
    token: readText(additional, 'token'),
    hmacSignature: readText(payload, 'hmacSignature') ?? '',
    raw: payload,
  };
}
