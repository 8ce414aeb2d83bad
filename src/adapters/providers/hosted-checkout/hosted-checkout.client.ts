import {
  CheckoutLineItem,
  CheckoutSession,
  CheckoutStatus,
  GatewaySettings,
  HttpTransport,
  JsonObject,
  ModificationResponse,
  ReconcilerLogger,
  SessionClient,
  TEST_API_BASE_URL,
  TokenPaymentResult,
  isJsonObject,
  readText,
} from '../../../core';
import { FetchHttpTransport } from './fetch-http.transport';

export type HostedCheckoutSettings = Pick<
  GatewaySettings,
  | 'apiKey'
  | 'terminalIdentifier'
  | 'tokenTerminalIdentifier'
  | 'themeKey'
  | 'manualCapture'
  | 'sendItems'
  | 'checkoutExpiryHours'
  | 'testMode'
  | 'productionUrl'
>;

export const REQUEST_TIMEOUT_MS = 60000;

export const MIN_EXPIRY_HOURS = 0.0833;
export const MAX_EXPIRY_HOURS = 24;

export function clampExpiryHours(hours: number): number {
  if (!Number.isFinite(hours)) {
    return MAX_EXPIRY_HOURS;
  }
  return Math.min(MAX_EXPIRY_HOURS, Math.max(MIN_EXPIRY_HOURS, hours));
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Hosted checkout API client
 *
 * Authentication: `X-API-key` header on every call. Every operation is
 * one POST with a fixed timeout and no retry; any failure resolves to
 * null (false for reverse).
 */
export class HostedCheckoutClient implements SessionClient {
  readonly baseUrl: string;
  private readonly expiryHours: number;

  constructor(
    private readonly settings: HostedCheckoutSettings,
    private readonly transport: HttpTransport = new FetchHttpTransport(),
    private readonly logger: ReconcilerLogger = console,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.baseUrl = settings.testMode
      ? TEST_API_BASE_URL
      : withTrailingSlash(settings.productionUrl);
    this.expiryHours = clampExpiryHours(settings.checkoutExpiryHours);
  }

  async createSession(
    amount: number,
    currency: string,
    returnUrl: string,
    reference: string,
    items: CheckoutLineItem[],
    isSubscription: boolean,
    abandonUrl: string,
  ): Promise<CheckoutSession | null> {
    const body: JsonObject = {
      amount,
      currency,
      returnUrl,
      reference,
      terminalIdentifier: this.settings.terminalIdentifier,
      expiresAt: this.expiresAt(),
    };

    if (this.settings.sendItems) {
      body.items = items;
    }

    // Theme only applies to the production checkout
    if (!this.settings.testMode && this.settings.themeKey) {
      body.themeKey = this.settings.themeKey;
    }

    if (this.settings.manualCapture) {
      body.isManualCapture = true;
    }

    if (isSubscription) {
      body.recurringProcessingModel = 'Subscription';
    }

    if (abandonUrl) {
      body.abandonUrl = abandonUrl;
    }

    const data = await this.send('hostedcheckout/', body);
    if (!data) {
      return null;
    }

    const url = readText(data, 'url');
    const checkoutReference = readText(data, 'checkoutReference');
    if (!url || !checkoutReference) {
      this.logger.error(
        `Checkout session response for ${reference} is missing url or checkoutReference`,
      );
      return null;
    }

    return { url, checkoutReference };
  }

  async getStatus(checkoutReference: string): Promise<CheckoutStatus | null> {
    const data = await this.send(
      `hostedcheckout/status/${encodeURIComponent(checkoutReference)}`,
      {},
    );
    if (!data) {
      return null;
    }

    return {
      payfacReference: readText(data, 'payfacReference') || undefined,
      raw: data,
    };
  }

  async capture(
    payfacReference: string,
    reference: string,
    amount: number,
    currency: string,
  ): Promise<ModificationResponse | null> {
    return this.send('modification/capture', {
      reference,
      payfacReference,
      amount,
      currency,
    });
  }

  async reverse(reference: string, payfacReference: string): Promise<boolean> {
    const data = await this.send('modification/reverse', {
      reference,
      payfacReference,
    });
    return data !== null && Object.keys(data).length > 0;
  }

  async refund(
    payfacReference: string,
    reference: string,
    amount: number,
    currency: string,
  ): Promise<ModificationResponse | null> {
    return this.send('modification/refund', {
      reference,
      payfacReference,
      amount,
      currency,
    });
  }

  async processTokenPayment(
    token: string,
    amount: number,
    currency: string,
    reference: string,
    shopperIp: string,
    origin: string,
    channel: string,
    returnUrl: string,
  ): Promise<TokenPaymentResult | null> {
    this.logger.log(
      `Processing token payment for reference ${reference} and amount ${amount}`,
    );

    const data = await this.send('payment', {
      terminalIdentifier: this.settings.tokenTerminalIdentifier,
      amount,
      currency,
      reference,
      shopperIp,
      origin,
      channel,
      returnUrl,
      tokenDetails: {
        tokenValue: token,
        recurringProcessingModel: 'Subscription',
      },
    });

    const resultCode = data ? readText(data, 'resultCode') ?? '' : '';

    if (resultCode === 'Authorised') {
      this.logger.log(`Token payment authorised for reference ${reference}`);
    } else if (resultCode === 'RedirectShopper') {
      this.logger.log(`Token payment requires redirect for reference ${reference}`);
    } else {
      this.logger.error(
        `Token payment failed for reference ${reference} with response: ${JSON.stringify(data)}`,
      );
    }

    if (!data) {
      return null;
    }

    const redirect = data.action ?? data.redirect;
    return {
      resultCode,
      redirect: isJsonObject(redirect) ? redirect : undefined,
      raw: data,
    };
  }

  /**
   * Expiry timestamp, whole seconds, ISO-8601 with milliseconds
   */
  private expiresAt(): string {
    const nowSeconds = Math.floor(this.clock().getTime() / 1000);
    const windowSeconds = Math.trunc(this.expiryHours * 3600);
    return new Date((nowSeconds + windowSeconds) * 1000).toISOString();
  }

  private async send(
    endpoint: string,
    body: JsonObject,
  ): Promise<JsonObject | null> {
    const url = `${this.baseUrl}${endpoint}`;
    this.logger.debug?.(`POST ${url} ${JSON.stringify(body)}`);

    let status: number;
    let responseBody: string;
    try {
      const response = await this.transport.send({
        method: 'POST',
        url,
        headers: {
          'Content-Type': 'application/json',
          'X-API-key': this.settings.apiKey,
        },
        body: JSON.stringify(body),
        timeoutMs: REQUEST_TIMEOUT_MS,
      });
      status = response.status;
      responseBody = response.body;
    } catch (error) {
      this.logger.error(
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }

    this.logger.debug?.(`Response ${status} from ${url}: ${responseBody}`);

    let data: unknown;
    try {
      data = JSON.parse(responseBody);
    } catch (error) {
      this.logger.error(
        `JSON decode error from ${url}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }

    if (status < 200 || status >= 300) {
      this.logger.error(`Processor API error ${status} from ${url}`);
      return null;
    }

    if (!isJsonObject(data)) {
      this.logger.error(`Unexpected response shape from ${url}`);
      return null;
    }

    return data;
  }
}
