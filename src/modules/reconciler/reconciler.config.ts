import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { DataSourceOptions } from 'typeorm';
import type {
  GatewaySettings,
  HttpTransport,
  LifecycleHooks,
  OrderStore,
  SubscriptionGateway,
} from '../../core';

/**
 * Reconciler Module Configuration
 */
export interface ReconcilerModuleConfig {
  /**
   * Gateway settings layered over the CHECKOUT_* environment
   */
  settings?: Partial<GatewaySettings>;

  /**
   * Order store configuration
   */
  storage: {
    type: 'memory' | 'typeorm' | 'custom';
    options?: DataSourceOptions;
    adapter?: OrderStore;
  };

  /**
   * Stored-card and subscription backend. Without one, tokenization
   * events are noted but not stored and refunds cancel nothing.
   */
  subscriptions?: SubscriptionGateway;

  /**
   * Outbound HTTP for the processor API; defaults to fetch
   */
  transport?: HttpTransport;

  hooks?: LifecycleHooks;

  webhooks?: {
    timeoutMs?: number;
    throwOnError?: boolean;
  };
}

/**
 * Async configuration factory
 */
export interface ReconcilerModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<ReconcilerModuleConfig>['useFactory'];
}

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 30000;
