/**
 * Injection tokens for the reconciler module
 */

export const RECONCILER_CONFIG = Symbol('RECONCILER_CONFIG');
export const GATEWAY_SETTINGS = Symbol('GATEWAY_SETTINGS');
export const ORDER_STORE = Symbol('ORDER_STORE');
export const SUBSCRIPTION_GATEWAY = Symbol('SUBSCRIPTION_GATEWAY');
export const SESSION_CLIENT = Symbol('SESSION_CLIENT');
export const RETURN_TOKEN_SIGNER = Symbol('RETURN_TOKEN_SIGNER');
export const ORDER_STATE_MACHINE = Symbol('ORDER_STATE_MACHINE');
export const WEBHOOK_RECONCILER = Symbol('WEBHOOK_RECONCILER');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
export const LIFECYCLE_BRIDGE = Symbol('LIFECYCLE_BRIDGE');
export const CHECKOUT_SERVICE = Symbol('CHECKOUT_SERVICE');
export const CHECKOUT_RETURN_SERVICE = Symbol('CHECKOUT_RETURN_SERVICE');
