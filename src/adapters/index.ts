// Processor client
export * from './providers/hosted-checkout';

// Order stores
export { KeyedMutex } from './storage/keyed-mutex';
export * from './storage/memory';
export * from './storage/typeorm';

// Subscriptions
export * from './subscriptions';
