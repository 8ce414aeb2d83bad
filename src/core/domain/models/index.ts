export * from './order.model';
export * from './order-payment-state.model';
export * from './payment-event.model';
