import {
  DynamicModule,
  Global,
  Logger,
  Module,
  Provider,
} from '@nestjs/common';
import type {
  ReconcilerModuleAsyncConfig,
  ReconcilerModuleConfig,
} from './reconciler.config';
import {
  CheckoutReturnService,
  CheckoutService,
  GatewaySettings,
  OrderLifecycleBridge,
  OrderStateMachine,
  OrderStore,
  ReturnTokenSigner,
  SessionClient,
  SignatureVerifier,
  SubscriptionGateway,
  WebhookProcessor,
  WebhookReconciler,
} from '../../core';
import {
  createDataSource,
  FetchHttpTransport,
  HostedCheckoutClient,
  InMemoryOrderStore,
  TypeORMOrderStore,
} from '../../adapters';
import {
  CHECKOUT_RETURN_SERVICE,
  CHECKOUT_SERVICE,
  GATEWAY_SETTINGS,
  LIFECYCLE_BRIDGE,
  ORDER_STATE_MACHINE,
  ORDER_STORE,
  RECONCILER_CONFIG,
  RETURN_TOKEN_SIGNER,
  SESSION_CLIENT,
  SUBSCRIPTION_GATEWAY,
  WEBHOOK_PROCESSOR,
  WEBHOOK_RECONCILER,
} from './constants';
import { ConfigurationService } from './services/configuration.service';
import { WebhookController } from './controllers/webhook.controller';
import { CheckoutController } from './controllers/checkout.controller';
import { OrderTransitionController } from './controllers/order-transition.controller';
import { HealthController } from './controllers/health.controller';

const CONTROLLERS = [
  WebhookController,
  CheckoutController,
  OrderTransitionController,
  HealthController,
];

const EXPORTS = [
  RECONCILER_CONFIG,
  GATEWAY_SETTINGS,
  ORDER_STORE,
  SESSION_CLIENT,
  WEBHOOK_PROCESSOR,
  LIFECYCLE_BRIDGE,
  CHECKOUT_SERVICE,
  CHECKOUT_RETURN_SERVICE,
  ConfigurationService,
];

/**
 * Reconciler Module - Main NestJS Module
 *
 * Wires the payment callback pipeline, the order lifecycle bridge and
 * hosted checkout around one order store.
 */
@Global()
@Module({})
export class ReconcilerModule {
  /**
   * Configure the reconciler synchronously
   */
  static forRoot(config: ReconcilerModuleConfig): DynamicModule {
    return {
      module: ReconcilerModule,
      providers: [
        {
          provide: RECONCILER_CONFIG,
          useValue: config,
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Configure the reconciler asynchronously
   */
  static forRootAsync(options: ReconcilerModuleAsyncConfig): DynamicModule {
    return {
      module: ReconcilerModule,
      imports: options.imports || [],
      providers: [
        {
          provide: RECONCILER_CONFIG,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Providers shared by both registration styles; everything hangs off
   * RECONCILER_CONFIG
   */
  private static createProviders(): Provider[] {
    return [
      ConfigurationService,
      {
        provide: GATEWAY_SETTINGS,
        useFactory: (configuration: ConfigurationService): GatewaySettings =>
          configuration.getSettings(),
        inject: [ConfigurationService],
      },
      {
        provide: ORDER_STORE,
        useFactory: (config: ReconcilerModuleConfig) =>
          this.createOrderStore(config),
        inject: [RECONCILER_CONFIG],
      },
      {
        provide: SUBSCRIPTION_GATEWAY,
        useFactory: (
          config: ReconcilerModuleConfig,
        ): SubscriptionGateway | null => config.subscriptions ?? null,
        inject: [RECONCILER_CONFIG],
      },
      {
        provide: SESSION_CLIENT,
        useFactory: (
          settings: GatewaySettings,
          config: ReconcilerModuleConfig,
        ): SessionClient =>
          new HostedCheckoutClient(
            settings,
            config.transport ?? new FetchHttpTransport(),
            new Logger(HostedCheckoutClient.name),
          ),
        inject: [GATEWAY_SETTINGS, RECONCILER_CONFIG],
      },
      {
        provide: RETURN_TOKEN_SIGNER,
        useFactory: (settings: GatewaySettings) =>
          new ReturnTokenSigner(settings.hmacSecret),
        inject: [GATEWAY_SETTINGS],
      },
      {
        provide: ORDER_STATE_MACHINE,
        useFactory: () => new OrderStateMachine(),
      },
      {
        provide: WEBHOOK_RECONCILER,
        useFactory: (
          settings: GatewaySettings,
          subscriptions: SubscriptionGateway | null,
          stateMachine: OrderStateMachine,
        ) =>
          new WebhookReconciler(
            settings,
            subscriptions ?? undefined,
            stateMachine,
            new Logger(WebhookReconciler.name),
          ),
        inject: [GATEWAY_SETTINGS, SUBSCRIPTION_GATEWAY, ORDER_STATE_MACHINE],
      },
      {
        provide: WEBHOOK_PROCESSOR,
        useFactory: (
          config: ReconcilerModuleConfig,
          configuration: ConfigurationService,
          settings: GatewaySettings,
          orderStore: OrderStore,
          reconciler: WebhookReconciler,
        ) =>
          new WebhookProcessor({
            orderStore,
            signatureVerifier: new SignatureVerifier(settings.hmacSecret),
            reconciler,
            hooks: config.hooks,
            throwOnError: config.webhooks?.throwOnError,
            timeoutMs: configuration.getWebhookTimeoutMs(),
            logger: new Logger(WebhookProcessor.name),
          }),
        inject: [
          RECONCILER_CONFIG,
          ConfigurationService,
          GATEWAY_SETTINGS,
          ORDER_STORE,
          WEBHOOK_RECONCILER,
        ],
      },
      {
        provide: LIFECYCLE_BRIDGE,
        useFactory: (
          orderStore: OrderStore,
          sessionClient: SessionClient,
          subscriptions: SubscriptionGateway | null,
          stateMachine: OrderStateMachine,
        ) =>
          new OrderLifecycleBridge(
            orderStore,
            sessionClient,
            subscriptions ?? undefined,
            stateMachine,
            new Logger(OrderLifecycleBridge.name),
          ),
        inject: [
          ORDER_STORE,
          SESSION_CLIENT,
          SUBSCRIPTION_GATEWAY,
          ORDER_STATE_MACHINE,
        ],
      },
      {
        provide: CHECKOUT_SERVICE,
        useFactory: (
          orderStore: OrderStore,
          sessionClient: SessionClient,
          settings: GatewaySettings,
          returnTokens: ReturnTokenSigner,
        ) =>
          new CheckoutService(
            orderStore,
            sessionClient,
            settings,
            returnTokens,
            new Logger(CheckoutService.name),
          ),
        inject: [ORDER_STORE, SESSION_CLIENT, GATEWAY_SETTINGS, RETURN_TOKEN_SIGNER],
      },
      {
        provide: CHECKOUT_RETURN_SERVICE,
        useFactory: (
          orderStore: OrderStore,
          sessionClient: SessionClient,
          settings: GatewaySettings,
          returnTokens: ReturnTokenSigner,
        ) =>
          new CheckoutReturnService(
            orderStore,
            sessionClient,
            settings,
            returnTokens,
            new Logger(CheckoutReturnService.name),
          ),
        inject: [ORDER_STORE, SESSION_CLIENT, GATEWAY_SETTINGS, RETURN_TOKEN_SIGNER],
      },
    ];
  }

  private static async createOrderStore(
    config: ReconcilerModuleConfig,
  ): Promise<OrderStore> {
    switch (config.storage.type) {
      case 'memory':
        return new InMemoryOrderStore();

      case 'typeorm': {
        const dataSource = createDataSource(config.storage.options);
        await dataSource.initialize();
        return new TypeORMOrderStore(dataSource);
      }

      case 'custom':
        if (!config.storage.adapter) {
          throw new Error('Custom order store not provided');
        }
        return config.storage.adapter;

      default:
        throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
    }
  }
}
