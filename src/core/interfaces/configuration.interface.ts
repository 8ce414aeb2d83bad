/**
 * Merchant gateway settings, read-only to the core
 */
export interface GatewaySettings {
  apiKey: string;

  /**
   * Hex-encoded HMAC key shared with the processor
   */
  hmacSecret: string;

  terminalIdentifier: string;

  /**
   * Terminal used for stored-token renewals
   */
  tokenTerminalIdentifier: string;

  /**
   * Hosted checkout theme, sent outside test mode only
   */
  themeKey: string;

  /**
   * Authorize only; capture is a separate merchant action
   */
  manualCapture: boolean;

  /**
   * Send order lines with the checkout session
   */
  sendItems: boolean;

  /**
   * Hosted checkout lifetime, clamped to [0.0833, 24]
   */
  checkoutExpiryHours: number;

  testMode: boolean;

  productionUrl: string;

  /**
   * Mark paid orders completed instead of processing
   */
  completeOnPayment: boolean;

  /**
   * Public URL of the shopper return endpoint
   */
  returnUrl: string;
  successUrl: string;
  abandonUrl: string;
  cartUrl: string;
}

export const TEST_API_BASE_URL =
  'https://checkout-api.staging.straumur.is/api/v1/';

export const DEFAULT_PRODUCTION_API_BASE_URL =
  'https://greidslugatt.straumur.is/api/v1/';

export const defaultGatewaySettings: Omit<
  GatewaySettings,
  'apiKey' | 'hmacSecret' | 'terminalIdentifier'
> = {
  tokenTerminalIdentifier: '',
  themeKey: '',
  manualCapture: false,
  sendItems: false,
  checkoutExpiryHours: 24,
  testMode: true,
  productionUrl: DEFAULT_PRODUCTION_API_BASE_URL,
  completeOnPayment: false,
  returnUrl: '',
  successUrl: '',
  abandonUrl: '',
  cartUrl: '',
};
