import { Type, plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsPositive, IsString, Max, Min, validateSync } from 'class-validator';

// Environment-backed settings, validated once at start-up.
export class LedgerSettings {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  HOLDINGS_PATH?: string;

  @IsString()
  @IsNotEmpty()
  SNAPSHOT_OUTPUT: string = 'output/holdings_snapshot.json';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  FINNHUB_API_KEY?: string;

  @Type(() => Number)
  @IsInt()
  @IsPositive()
  QUOTE_TIMEOUT_MS: number = 8000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  QUOTE_MAX_RETRIES: number = 2;
}

const SETTING_KEYS = [
  'HOLDINGS_PATH',
  'SNAPSHOT_OUTPUT',
  'PORT',
  'FINNHUB_API_KEY',
  'QUOTE_TIMEOUT_MS',
  'QUOTE_MAX_RETRIES',
] as const;

/**
 * Builds settings from an environment map. Unset or empty variables
 * keep their defaults.
 * @throws Error listing every invalid setting
 */
export function validateSettings(env: Record<string, string | undefined>): LedgerSettings {
  const plain: Record<string, string> = {};
  for (const key of SETTING_KEYS) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      plain[key] = value;
    }
  }

  const settings = plainToInstance(LedgerSettings, plain);
  const errors = validateSync(settings);
  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid configuration - ${details}`);
  }
  return settings;
}
