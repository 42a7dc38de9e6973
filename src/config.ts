/**
 * Job configuration.
 *
 * Usage & purpose:
 * - OPENWEATHER_PARAMS documents the query parameters the current-weather endpoint accepts
 * - loadConfig reads the environment once; the result is passed explicitly into every stage
 * - Secrets are opaque strings: only their presence is checked
 */

import { ConfigError } from './errors.js';
import { EXTRACT_RETRY, LOAD_RETRY, type RetryPolicy } from './retry.js';

export const OPENWEATHER_PARAMS = {
  q: {
    description: 'City name, optionally with ISO 3166 country code',
    values: 'String: "<city>,<country>" e.g. "Bournemouth,GB"',
  },
  appid: {
    description: 'API key',
    values: 'Opaque string',
  },
  units: {
    description: 'Unit system for temperatures',
    values: ['standard', 'metric', 'imperial'],
  },
} as const;

export type UnitSystem = (typeof OPENWEATHER_PARAMS.units.values)[number];

export const DEFAULTS: Readonly<Omit<ExtractConfig, 'apiKey'>> = {
  apiBaseUrl: 'https://api.openweathermap.org/data/2.5/weather',
  city: 'Bournemouth,GB',
  units: 'standard',
  requestTimeoutMs: 10_000,
};

export interface ExtractConfig {
  apiKey: string;
  apiBaseUrl: string;
  city: string;
  units: UnitSystem;
  requestTimeoutMs: number;
}

export interface LoadConfig {
  connectionString: string;
  ssl: boolean;
}

export interface PipelineConfig {
  extract: ExtractConfig;
  /** null only in dry-run mode. */
  load: LoadConfig | null;
  extractRetry: RetryPolicy;
  loadRetry: RetryPolicy;
  dryRun: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  { positive = false }: { positive?: boolean } = {}
): number {
  const raw = readString(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (positive && value === 0)) {
    const expected = positive ? 'a positive number' : 'a non-negative number';
    throw new ConfigError(`${key} must be ${expected}, got "${raw}"`);
  }
  return value;
}

function readUnits(env: Env): UnitSystem {
  const raw = readString(env, 'WEATHER_UNITS');
  if (raw === undefined) {
    return DEFAULTS.units;
  }
  const match = OPENWEATHER_PARAMS.units.values.find((unit) => unit === raw.toLowerCase());
  if (!match) {
    throw new ConfigError(
      `WEATHER_UNITS must be one of ${OPENWEATHER_PARAMS.units.values.join(', ')}, got "${raw}"`
    );
  }
  return match;
}

export function loadConfig(env: Env = process.env): PipelineConfig {
  const apiKey = readString(env, 'OPENWEATHER_API_KEY');
  if (!apiKey) {
    throw new ConfigError('OPENWEATHER_API_KEY environment variable is required');
  }

  const dryRun = env.DRY_RUN === '1';

  // Prefer pooler URL, fall back to direct connection
  const connectionString =
    readString(env, 'DATABASE_POOLER_URL') ?? readString(env, 'DATABASE_URL');
  if (!connectionString && !dryRun) {
    throw new ConfigError(
      'DATABASE_URL or DATABASE_POOLER_URL environment variable is required for database connection'
    );
  }

  return {
    extract: {
      apiKey,
      apiBaseUrl: readString(env, 'OPENWEATHER_BASE_URL') ?? DEFAULTS.apiBaseUrl,
      city: readString(env, 'WEATHER_CITY') ?? DEFAULTS.city,
      units: readUnits(env),
      requestTimeoutMs: readNumber(env, 'WEATHER_REQUEST_TIMEOUT_MS', DEFAULTS.requestTimeoutMs, {
        positive: true,
      }),
    },
    load: connectionString
      ? { connectionString, ssl: env.DATABASE_SSL !== '0' }
      : null,
    extractRetry: {
      ...EXTRACT_RETRY,
      delayMs: readNumber(env, 'EXTRACT_RETRY_DELAY_MS', EXTRACT_RETRY.delayMs),
    },
    loadRetry: {
      ...LOAD_RETRY,
      delayMs: readNumber(env, 'LOAD_RETRY_DELAY_MS', LOAD_RETRY.delayMs),
    },
    dryRun,
  };
}
