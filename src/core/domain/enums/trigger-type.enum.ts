/**
 * Source of an order status change
 */
export enum TriggerType {
  /**
   * Processor notification on the payment callback
   */
  WEBHOOK = 'webhook',

  /**
   * Merchant changed the status in the commerce platform
   */
  MERCHANT = 'merchant',
}
