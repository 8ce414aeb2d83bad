import * as crypto from 'crypto';
import { decodeHexSecret, timingSafeEqual } from './signature-verifier';

/**
 * Anti-replay token carried on the shopper return URL.
 * base64url HMAC-SHA256 over `return:{orderId}`.
 */
export class ReturnTokenSigner {
  constructor(private readonly hmacSecret: string) {}

  issue(orderId: number): string | null {
    const key = decodeHexSecret(this.hmacSecret);
    if (!key) {
      return null;
    }

    return crypto
      .createHmac('sha256', key)
      .update(`return:${orderId}`)
      .digest('base64url');
  }

  verify(orderId: number, token: string | undefined): boolean {
    if (!token) {
      return false;
    }

    const expected = this.issue(orderId);
    return expected !== null && timingSafeEqual(expected, token);
  }
}
