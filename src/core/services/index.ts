export * from './webhook-reconciler.service';
export * from './order-lifecycle-bridge.service';
export * from './checkout.service';
export * from './checkout-return.service';
