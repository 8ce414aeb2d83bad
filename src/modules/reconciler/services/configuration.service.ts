import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { GatewaySettings } from '../../../core';
import {
  DEFAULT_WEBHOOK_TIMEOUT_MS,
  type ReconcilerModuleConfig,
} from '../reconciler.config';
import { RECONCILER_CONFIG } from '../constants';
import { loadGatewaySettings } from '../config/gateway-settings';

/**
 * Configuration Service
 *
 * Resolves gateway settings from the environment (through ConfigService
 * when the host app registers ConfigModule) and module options.
 */
@Injectable()
export class ConfigurationService {
  private settings?: GatewaySettings;

  constructor(
    @Inject(RECONCILER_CONFIG)
    private readonly config: ReconcilerModuleConfig,
    @Optional()
    private readonly configService?: ConfigService,
  ) {}

  /**
   * Validated settings; throws InvalidSettingsError on first use if the
   * environment is incomplete
   */
  getSettings(): GatewaySettings {
    if (!this.settings) {
      this.settings = loadGatewaySettings(
        (key) => this.readEnv(key),
        this.config.settings,
      );
    }
    return this.settings;
  }

  getWebhookTimeoutMs(): number {
    return this.config.webhooks?.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
  }

  private readEnv(key: string): string | undefined {
    if (this.configService) {
      return this.configService.get<string>(key);
    }
    return process.env[key];
  }
}
