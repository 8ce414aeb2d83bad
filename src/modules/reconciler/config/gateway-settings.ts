import { plainToInstance, Transform, TransformFnParams, Type } from 'class-transformer';
import {
  IsBoolean,
  IsNotEmpty,
  IsNumber,
  IsString,
  IsUrl,
  Matches,
  validateSync,
  ValidationError,
} from 'class-validator';
import { defaultGatewaySettings, GatewaySettings } from '../../../core';

/**
 * Environment variable for each gateway setting
 */
export const GATEWAY_ENV_KEYS: Record<keyof GatewaySettings, string> = {
  apiKey: 'CHECKOUT_API_KEY',
  hmacSecret: 'CHECKOUT_HMAC_SECRET',
  terminalIdentifier: 'CHECKOUT_TERMINAL_ID',
  tokenTerminalIdentifier: 'CHECKOUT_TOKEN_TERMINAL_ID',
  themeKey: 'CHECKOUT_THEME_KEY',
  manualCapture: 'CHECKOUT_MANUAL_CAPTURE',
  sendItems: 'CHECKOUT_SEND_ITEMS',
  checkoutExpiryHours: 'CHECKOUT_EXPIRY_HOURS',
  testMode: 'CHECKOUT_TEST_MODE',
  productionUrl: 'CHECKOUT_PRODUCTION_URL',
  completeOnPayment: 'CHECKOUT_COMPLETE_ON_PAYMENT',
  returnUrl: 'CHECKOUT_RETURN_URL',
  successUrl: 'CHECKOUT_SUCCESS_URL',
  abandonUrl: 'CHECKOUT_ABANDON_URL',
  cartUrl: 'CHECKOUT_CART_URL',
};

export class InvalidSettingsError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid gateway settings: ${problems.join('; ')}`);
    this.name = 'InvalidSettingsError';
  }
}

const toBoolean = ({ value }: TransformFnParams): unknown => {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off', ''].includes(normalized)) {
    return false;
  }
  return value;
};

class GatewaySettingsDto implements GatewaySettings {
  @IsString()
  @IsNotEmpty({ message: 'API key is required' })
  apiKey!: string;

  @IsString()
  @Matches(/^(?:[0-9a-fA-F]{2})+$/, {
    message: 'HMAC secret must be a non-empty hex string',
  })
  hmacSecret!: string;

  @IsString()
  @IsNotEmpty({ message: 'terminal identifier is required' })
  terminalIdentifier!: string;

  @IsString()
  tokenTerminalIdentifier!: string;

  @IsString()
  themeKey!: string;

  @Transform(toBoolean)
  @IsBoolean()
  manualCapture!: boolean;

  @Transform(toBoolean)
  @IsBoolean()
  sendItems!: boolean;

  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  checkoutExpiryHours!: number;

  @Transform(toBoolean)
  @IsBoolean()
  testMode!: boolean;

  @IsUrl(
    { require_protocol: true, require_tld: false },
    { message: 'production URL must be an absolute URL' },
  )
  productionUrl!: string;

  @Transform(toBoolean)
  @IsBoolean()
  completeOnPayment!: boolean;

  @IsString()
  returnUrl!: string;

  @IsString()
  successUrl!: string;

  @IsString()
  abandonUrl!: string;

  @IsString()
  cartUrl!: string;
}

function flattenErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) =>
    Object.values(error.constraints ?? {}).map(
      (message) => `${error.property}: ${message}`,
    ),
  );
}

/**
 * Build validated gateway settings from environment values and explicit
 * overrides. Overrides win; unset values fall back to defaults.
 */
export function loadGatewaySettings(
  readEnv: (key: string) => string | undefined,
  overrides: Partial<GatewaySettings> = {},
): GatewaySettings {
  const plain: Record<string, unknown> = { ...defaultGatewaySettings };

  for (const [field, envKey] of Object.entries(GATEWAY_ENV_KEYS)) {
    const value = readEnv(envKey);
    if (value !== undefined) {
      plain[field] = value;
    }
  }

  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      plain[field] = value;
    }
  }

  const settings = plainToInstance(GatewaySettingsDto, plain);
  const errors = validateSync(settings);
  if (errors.length > 0) {
    throw new InvalidSettingsError(flattenErrors(errors));
  }

  return settings;
}
