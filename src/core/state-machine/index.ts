/**
 * Order status state machine
 */

export * from './order-state-machine';
export * from './types';
export * from './transition-rules';
