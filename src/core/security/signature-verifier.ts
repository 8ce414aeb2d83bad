import * as crypto from 'crypto';
import type { JsonObject } from '../interfaces/common.types';

/**
 * Fields covered by the processor's HMAC, in signing order
 */
export const SIGNED_FIELDS = [
  'checkoutReference',
  'payfacReference',
  'merchantReference',
  'amount',
  'currency',
  'reason',
  'success',
] as const;

export type SignedField = (typeof SIGNED_FIELDS)[number];

export type SignedFields = Partial<Record<SignedField, unknown>>;

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Decode a hex secret. Returns null for empty, odd-length or non-hex input.
 */
export function decodeHexSecret(secret: string): Buffer | null {
  if (!secret || !HEX_PATTERN.test(secret)) {
    return null;
  }
  return Buffer.from(secret, 'hex');
}

/**
 * Stringify a signed field the way it arrived on the wire
 */
function canonicalValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

export function buildSignaturePayload(fields: SignedFields | JsonObject): string {
  return SIGNED_FIELDS.map((field) => canonicalValue(fields[field])).join(':');
}

/**
 * Timing-safe string comparison
 */
export function timingSafeEqual(a: string, b: string): boolean {
  const bufferA = Buffer.from(a);
  const bufferB = Buffer.from(b);

  if (bufferA.length !== bufferB.length) {
    return false;
  }

  return crypto.timingSafeEqual(bufferA, bufferB);
}

/**
 * HMAC-SHA256 verification of inbound processor notifications.
 *
 * Never throws: a bad secret, a missing signature and a mismatch all
 * verify false.
 */
export class SignatureVerifier {
  constructor(private readonly hmacSecret: string) {}

  verify(fields: SignedFields | JsonObject, providedSignature: unknown): boolean {
    if (typeof providedSignature !== 'string' || providedSignature === '') {
      return false;
    }

    const expected = this.sign(fields);
    if (expected === null) {
      return false;
    }

    return timingSafeEqual(expected, providedSignature);
  }

  /**
   * Base64 signature for the given fields, or null when the secret is unusable
   */
  sign(fields: SignedFields | JsonObject): string | null {
    const key = decodeHexSecret(this.hmacSecret);
    if (!key) {
      return null;
    }

    return crypto
      .createHmac('sha256', key)
      .update(buildSignaturePayload(fields))
      .digest('base64');
  }
}
