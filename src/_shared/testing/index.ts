export * from './payment-event-factory';
export * from './order.factory';
