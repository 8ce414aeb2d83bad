export * from './reconciler.module';
export * from './reconciler.config';
export * from './constants';
export * from './config/gateway-settings';
export * from './controllers';
export * from './services/configuration.service';
export * from './interceptors/raw-body.interceptor';
