export * from './order-status.enum';
export * from './payment-event-type.enum';
export * from './processing-status.enum';
export * from './reconciliation-outcome.enum';
export * from './trigger-type.enum';
export * from './bridge-outcome.enum';
