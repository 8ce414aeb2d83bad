/**
 * Reconciler core - payment event handling with no framework dependency.
 * Storage, transport and subscriptions come in through interfaces.
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/value-objects/money.vo';
export * from './domain/value-objects/event-key.vo';

// Interfaces and contracts
export * from './interfaces';

// Signature and return-token checks
export * from './security';

// State machine
export * from './state-machine';

// Webhook processing pipeline
export * from './pipeline';

// Core services
export * from './services';
