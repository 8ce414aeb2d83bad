import * as crypto from 'crypto';
import {
  SignatureVerifier,
  buildSignaturePayload,
  decodeHexSecret,
  timingSafeEqual,
} from '../../src';
import { PaymentEventFactory, TEST_HMAC_SECRET } from '../../src/testing';

function referenceSignature(secretHex: string, message: string): string {
  return crypto
    .createHmac('sha256', Buffer.from(secretHex, 'hex'))
    .update(message)
    .digest('base64');
}

describe('SignatureVerifier', () => {
  const verifier = new SignatureVerifier(TEST_HMAC_SECRET);

  describe('buildSignaturePayload', () => {
    it('joins the signed fields in order with empty slots for missing ones', () => {
      const { payload } = PaymentEventFactory.authorization();

      expect(buildSignaturePayload(payload)).toBe(
        'CR-1001:P1:42:150000:ISK::true',
      );
    });

    it('stringifies numbers and booleans and drops nested values', () => {
      expect(
        buildSignaturePayload({
          checkoutReference: { nested: true },
          payfacReference: 'P9',
          merchantReference: 7,
          amount: 0,
          currency: 'EUR',
          reason: 'Refused',
          success: false,
        }),
      ).toBe(':P9:7:0:EUR:Refused:false');
    });
  });

  describe('verify', () => {
    it('accepts a signature produced with the shared secret', () => {
      const { payload } = PaymentEventFactory.authorization();

      expect(payload.hmacSignature).toBe(
        referenceSignature(TEST_HMAC_SECRET, 'CR-1001:P1:42:150000:ISK::true'),
      );
      expect(verifier.verify(payload, payload.hmacSignature)).toBe(true);
    });

    it('rejects a payload whose signed field was altered', () => {
      const { payload } = PaymentEventFactory.authorization();

      expect(
        verifier.verify({ ...payload, amount: 150001 }, payload.hmacSignature),
      ).toBe(false);
    });

    it('ignores fields outside the signed set', () => {
      const { payload } = PaymentEventFactory.authorization();

      expect(
        verifier.verify(
          { ...payload, additionalData: { eventType: 'refund' } },
          payload.hmacSignature,
        ),
      ).toBe(true);
    });

    it('rejects missing or non-string signatures', () => {
      const { payload } = PaymentEventFactory.authorization();

      expect(verifier.verify(payload, undefined)).toBe(false);
      expect(verifier.verify(payload, '')).toBe(false);
      expect(verifier.verify(payload, 12345)).toBe(false);
    });

    it('rejects the signature with any single character changed', () => {
      const { payload } = PaymentEventFactory.authorization();
      const signature = String(payload.hmacSignature);

      for (let i = 0; i < signature.length; i++) {
        const flipped =
          signature.slice(0, i) +
          (signature[i] === 'A' ? 'B' : 'A') +
          signature.slice(i + 1);

        expect(verifier.verify(payload, flipped)).toBe(false);
      }
    });

    it('rejects the signature when any hex digit of the secret changes', () => {
      const { payload } = PaymentEventFactory.authorization();

      for (let i = 0; i < TEST_HMAC_SECRET.length; i++) {
        const secret =
          TEST_HMAC_SECRET.slice(0, i) +
          (TEST_HMAC_SECRET[i] === '0' ? '1' : '0') +
          TEST_HMAC_SECRET.slice(i + 1);

        expect(
          new SignatureVerifier(secret).verify(payload, payload.hmacSignature),
        ).toBe(false);
      }
    });

    it('rejects a signature made with another secret', () => {
      const { payload } = PaymentEventFactory.authorization({
        secret: '00ff00ff',
      });

      expect(verifier.verify(payload, payload.hmacSignature)).toBe(false);
    });

    it.each(['', 'abc', 'zz11', 'not-hex'])(
      'never verifies with unusable secret %p',
      (secret) => {
        const { payload } = PaymentEventFactory.authorization();
        const broken = new SignatureVerifier(secret);

        expect(broken.sign(payload)).toBeNull();
        expect(broken.verify(payload, payload.hmacSignature)).toBe(false);
      },
    );
  });

  describe('decodeHexSecret', () => {
    it('decodes even-length hex in either case', () => {
      expect(decodeHexSecret('0aFF')).toEqual(Buffer.from([0x0a, 0xff]));
    });

    it('returns null for odd-length input', () => {
      expect(decodeHexSecret('abc')).toBeNull();
    });
  });

  describe('timingSafeEqual', () => {
    it('compares strings of different lengths as unequal', () => {
      expect(timingSafeEqual('abc', 'abcd')).toBe(false);
      expect(timingSafeEqual('abc', 'abc')).toBe(true);
    });
  });
});
