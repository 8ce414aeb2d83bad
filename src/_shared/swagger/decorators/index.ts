/**
 * Swagger decorators for the reconciler API
 *
 * Keep controllers focused on request handling.
 */

export * from './webhook.decorators';
export * from './checkout.decorators';
export * from './order.decorators';
export * from './health.decorators';
