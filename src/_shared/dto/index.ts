/**
 * DTOs for the reconciler API
 *
 * Input validation and Swagger documentation for the HTTP endpoints.
 */

export * from './checkout.dto';
export * from './order-transition.dto';
export * from './payment-callback.dto';
