/**
 * Loader: writes one processed observation into the weather_data table in Postgres/Supabase.
 *
 * Purpose:
 * - Opens a dedicated connection per load (no pool: the job writes one row and exits).
 * - Runs a single parameterized INSERT ... ON CONFLICT (obs_date, city) DO NOTHING
 *   inside a transaction, so re-runs for the same day and city leave one row.
 * - Rolls back on any failure and always closes the connection.
 *
 * Usage:
 *   import { loadObservation } from './db.js';
 *   const { inserted } = await loadObservation(processed, config.load);
 *
 * Schema:
 *   sql/weather_data.sql
 */

import pg from 'pg';

import type { LoadConfig } from './config.js';
import { SinkUnavailableError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { ProcessedObservation } from './types.js';

/**
 * The slice of a pg client the loader needs. Tests substitute an in-process fake.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rowCount: number | null }>;
  end(): Promise<void>;
}

export type Connect = (config: LoadConfig, logger: Logger) => Promise<SqlClient>;

export interface LoadDeps {
  connect?: Connect;
  logger?: Logger;
}

export interface LoadResult {
  /** false when a row for the same (obs_date, city) already existed. */
  inserted: boolean;
}

export const WEATHER_TABLE = 'weather_data';

export const WEATHER_COLUMNS = [
  'date',
  'obs_date',
  'city',
  'temp_kelvin',
  'temp_celsius',
  'humidity',
  'description',
  'data_quality',
] as const;

export type WeatherColumn = (typeof WEATHER_COLUMNS)[number];

const TIMEOUTS = {
  connectionTimeoutMillis: 20000,
  statement_timeout: 30000,
  query_timeout: 30000,
};

/**
 * Supabase transaction-mode pooler (port 6543) needs pgbouncer=true.
 */
export function normalizeConnectionString(connectionString: string): string {
  if (!connectionString.includes(':6543/')) {
    return connectionString;
  }
  const url = new URL(connectionString.replace(/^postgres(ql)?:\/\//, 'http://'));
  if (url.searchParams.has('pgbouncer')) {
    return connectionString;
  }
  return connectionString + (connectionString.includes('?') ? '&' : '?') + 'pgbouncer=true';
}

/**
 * Open a single pg.Client. The caller owns it and must call end().
 */
export async function connectPg(
  config: LoadConfig,
  logger: Logger = console
): Promise<SqlClient> {
  const client = new pg.Client({
    connectionString: normalizeConnectionString(config.connectionString),
    ...TIMEOUTS,
    // Supabase requires SSL; local Postgres usually has none
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
  });

  try {
    await client.connect();
  } catch (err) {
    await client.end().catch((endErr: unknown) => {
      logger.warn(`[load] Could not close failed connection: ${errorMessage(endErr)}`);
    });
    throw err;
  }

  return {
    query: (text, values) => client.query(text, values),
    end: () => client.end(),
  };
}

/**
 * Run fn with a freshly opened client and close it afterwards, whatever happens.
 */
export async function withClient<T>(
  config: LoadConfig,
  fn: (client: SqlClient) => Promise<T>,
  deps: LoadDeps = {}
): Promise<T> {
  const connect = deps.connect ?? connectPg;
  const logger = deps.logger ?? console;

  let client: SqlClient;
  try {
    client = await connect(config, logger);
  } catch (err) {
    throw new SinkUnavailableError(`Database connection failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  try {
    return await fn(client);
  } finally {
    try {
      await client.end();
    } catch (err) {
      logger.warn(`[load] Failed to close database connection: ${errorMessage(err)}`);
    }
  }
}

export function buildInsertStatement(): string {
  const placeholders = WEATHER_COLUMNS.map((_, index) => `$${index + 1}`).join(', ');
  return `
      INSERT INTO ${WEATHER_TABLE} (${WEATHER_COLUMNS.join(', ')})
      VALUES (${placeholders})
      ON CONFLICT (obs_date, city) DO NOTHING
    `;
}

/** UTC calendar date, YYYY-MM-DD. */
export function observationDate(observedAt: Date): string {
  return observedAt.toISOString().slice(0, 10);
}

export function toRowValues(observation: ProcessedObservation): unknown[] {
  const row: Record<WeatherColumn, unknown> = {
    date: observation.observedAt,
    obs_date: observationDate(observation.observedAt),
    city: observation.city,
    temp_kelvin: observation.tempKelvin,
    temp_celsius: observation.tempCelsius,
    humidity: observation.humidity,
    description: observation.description,
    data_quality: observation.dataQuality,
  };
  return WEATHER_COLUMNS.map((column) => row[column]);
}

async function rollback(client: SqlClient, logger: Logger): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (err) {
    logger.error(`[load] Rollback failed: ${errorMessage(err)}`);
  }
}

/**
 * Insert one observation inside a transaction.
 * Any failure is rolled back and surfaces as SinkUnavailableError.
 */
export async function loadObservation(
  observation: ProcessedObservation,
  config: LoadConfig,
  deps: LoadDeps = {}
): Promise<LoadResult> {
  const logger = deps.logger ?? console;
  const startTime = Date.now();

  logger.log(`[load] Upserting ${observation.city} (${observationDate(observation.observedAt)})...`);

  return withClient(
    config,
    async (client) => {
      try {
        await client.query('BEGIN');
        const result = await client.query(buildInsertStatement(), toRowValues(observation));
        await client.query('COMMIT');

        const inserted = (result.rowCount ?? 0) > 0;
        const duration = Date.now() - startTime;
        logger.log(
          inserted
            ? `[load] ✓ Inserted 1 row into ${WEATHER_TABLE} in ${duration}ms`
            : `[load] ✓ Row already present for this date and city, nothing written (${duration}ms)`
        );
        return { inserted };
      } catch (err) {
        await rollback(client, logger);
        throw new SinkUnavailableError(`Database load failed: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    },
    deps
  );
}

/**
 * Open and close one connection. Used by scripts/check-db-connection.ts.
 */
export async function checkConnection(config: LoadConfig, deps: LoadDeps = {}): Promise<void> {
  await withClient(config, async (client) => {
    await client.query('SELECT 1');
  }, deps);
}
