/**
 * Fetch the current weather for one city from the OpenWeatherMap API.
 *
 * Usage:
 *   import { extractWeather } from './fetch.js';
 *   const raw = await extractWeather(config.extract);
 */

import type { ExtractConfig, UnitSystem } from './config.js';
import { MalformedRecordError, SourceUnavailableError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { RawObservation } from './types.js';

const USER_AGENT = 'weather-etl/0.1 (scheduled job)';

export interface ExtractDeps {
  fetch?: typeof fetch;
  logger?: Logger;
  now?: () => Date;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFiniteNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedRecordError(`Response field ${field} is missing or not a number`, 'extract');
  }
  return value;
}

function toKelvin(temp: number, units: UnitSystem): number {
  switch (units) {
    case 'standard':
      return temp;
    case 'metric':
      return temp + 273.15;
    case 'imperial':
      return ((temp - 32) * 5) / 9 + 273.15;
  }
}

/** "Bournemouth,GB" -> "Bournemouth" */
export function cityNameFromQuery(city: string): string {
  return city.split(',')[0].trim();
}

export function buildRequestUrl(config: ExtractConfig): URL {
  const url = new URL(config.apiBaseUrl);
  url.searchParams.set('q', config.city);
  url.searchParams.set('appid', config.apiKey);
  url.searchParams.set('units', config.units);
  return url;
}

/**
 * Map a current-weather JSON body onto a RawObservation.
 * Only main.temp, main.humidity and weather[0].description are required.
 */
export function parseObservation(
  body: unknown,
  config: Pick<ExtractConfig, 'city' | 'units'>,
  now: () => Date = () => new Date()
): RawObservation {
  if (!isObject(body)) {
    throw new MalformedRecordError('Response body is not a JSON object', 'extract');
  }

  const main = body.main;
  if (!isObject(main)) {
    throw new MalformedRecordError('Response field main is missing', 'extract');
  }

  const weather = Array.isArray(body.weather) ? body.weather : [];
  const first: unknown = weather[0];
  const description = isObject(first) ? first.description : undefined;
  if (typeof description !== 'string') {
    throw new MalformedRecordError('Response field weather[0].description is missing', 'extract');
  }

  const reportedName = typeof body.name === 'string' ? body.name.trim() : '';
  const observedAt =
    typeof body.dt === 'number' && Number.isFinite(body.dt) ? new Date(body.dt * 1000) : now();

  return {
    observedAt,
    city: reportedName || cityNameFromQuery(config.city),
    tempKelvin: toKelvin(readFiniteNumber(main.temp, 'main.temp'), config.units),
    humidity: readFiniteNumber(main.humidity, 'main.humidity'),
    description,
  };
}

/**
 * Perform one GET against the current-weather endpoint and parse the result.
 *
 * Non-2xx answers, network errors, timeouts and non-JSON bodies raise
 * SourceUnavailableError. 4xx answers other than 408/429 mean the request
 * itself is wrong (bad key, unknown city) and are flagged non-retryable.
 */
export async function extractWeather(
  config: ExtractConfig,
  deps: ExtractDeps = {}
): Promise<RawObservation> {
  const doFetch = deps.fetch ?? fetch;
  const logger = deps.logger ?? console;
  const url = buildRequestUrl(config);

  logger.log(`[extract] Fetching current weather for ${config.city}...`);

  let response: Response;
  try {
    response = await doFetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(config.requestTimeoutMs),
    });
  } catch (err) {
    throw new SourceUnavailableError(`Weather API request failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (!response.ok) {
    const status = response.status;
    const clientFault = status >= 400 && status < 500 && status !== 408 && status !== 429;
    // Release the connection; the error body is not used
    await response.body?.cancel();
    throw new SourceUnavailableError(`HTTP ${status}: ${response.statusText}`, {
      status,
      retryable: !clientFault,
    });
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new SourceUnavailableError(`Failed to parse JSON: ${errorMessage(err)}`, {
      status: response.status,
      cause: err,
    });
  }

  const raw = parseObservation(body, config, deps.now);
  logger.log(`[extract] ✓ ${raw.city}: ${raw.tempKelvin}K, ${raw.humidity}% humidity`);
  return raw;
}
