/**
 * Checkout Reconciler
 *
 * Turns signed hosted-checkout notifications into deduplicated order
 * updates, and merchant status changes into processor commands.
 */
import 'reflect-metadata';

// Core components
export * from './core';

// Adapters
export * from './adapters';

// NestJS module, controllers and configuration
export * from './modules';

// DTOs and Swagger decorators
export * from './_shared';
