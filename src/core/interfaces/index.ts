// Interface and type exports
export * from './common.types';
export * from './order-store.adapter';
export * from './session-client.interface';
export * from './http-transport.interface';
export * from './subscription-gateway.interface';
export * from './configuration.interface';
