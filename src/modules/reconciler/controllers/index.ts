export * from './webhook.controller';
export * from './checkout.controller';
export * from './order-transition.controller';
export * from './health.controller';
