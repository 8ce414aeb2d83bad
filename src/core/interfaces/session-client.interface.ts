import { CheckoutLineItem, JsonObject } from './common.types';

/**
 * Hosted checkout session created for an order
 */
export interface CheckoutSession {
  url: string;
  checkoutReference: string;
}

/**
 * Result of a hosted checkout status query. A missing payfacReference
 * means the shopper never got to an authorization.
 */
export interface CheckoutStatus {
  payfacReference?: string;
  raw: JsonObject;
}

export type ModificationResponse = JsonObject;

export interface TokenPaymentResult {
  /**
   * `Authorised`, `RedirectShopper` or anything else (failure)
   */
  resultCode: string;
  redirect?: JsonObject;
  raw: JsonObject;
}

/**
 * Outbound command surface of the payment processor.
 *
 * Every operation is a single request. Transport failures, timeouts,
 * non-2xx statuses and undecodable bodies all resolve to null (false for
 * reverse); none of these methods reject.
 */
export interface SessionClient {
  createSession(
    amount: number,
    currency: string,
    returnUrl: string,
    reference: string,
    items: CheckoutLineItem[],
    isSubscription: boolean,
    abandonUrl: string,
  ): Promise<CheckoutSession | null>;

  getStatus(checkoutReference: string): Promise<CheckoutStatus | null>;

  capture(
    payfacReference: string,
    reference: string,
    amount: number,
    currency: string,
  ): Promise<ModificationResponse | null>;

  reverse(reference: string, payfacReference: string): Promise<boolean>;

  refund(
    payfacReference: string,
    reference: string,
    amount: number,
    currency: string,
  ): Promise<ModificationResponse | null>;

  processTokenPayment(
    token: string,
    amount: number,
    currency: string,
    reference: string,
    shopperIp: string,
    origin: string,
    channel: string,
    returnUrl: string,
  ): Promise<TokenPaymentResult | null>;
}
