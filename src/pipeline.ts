/**
 * Runs extract -> transform -> load once.
 *
 * The first stage to fail after its own retries stops the run; its error is
 * re-thrown as-is so the scheduler sees the original taxonomy. The loader
 * commits one row or nothing, so a failed run never leaves a partial write.
 */

import type { PipelineConfig } from './config.js';
import { loadObservation, type Connect } from './db.js';
import { extractWeather } from './fetch.js';
import type { Logger } from './logger.js';
import { TRANSFORM_RETRY, withRetry } from './retry.js';
import { transformObservation } from './transform.js';
import type { ProcessedObservation } from './types.js';

export interface PipelineDeps {
  fetch?: typeof fetch;
  connect?: Connect;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface RunResult {
  observation: ProcessedObservation;
  /** false when the row already existed or the load was skipped. */
  inserted: boolean;
  dryRun: boolean;
}

export async function runOnce(config: PipelineConfig, deps: PipelineDeps = {}): Promise<RunResult> {
  const logger = deps.logger ?? console;
  const retryOptions = { logger, sleep: deps.sleep };

  logger.log('\n--- Step 1: Extracting current weather ---');
  const raw = await withRetry(
    () => extractWeather(config.extract, { fetch: deps.fetch, logger, now: deps.now }),
    config.extractRetry,
    { ...retryOptions, label: 'extract' }
  );

  logger.log('\n--- Step 2: Transforming observation ---');
  const observation = await withRetry(
    async () => transformObservation(raw),
    TRANSFORM_RETRY,
    { ...retryOptions, label: 'transform' }
  );
  logger.log(
    `[transform] ✓ ${observation.city}: ${observation.tempCelsius}°C, ` +
      `${observation.humidity}% humidity, quality=${observation.dataQuality}`
  );

  if (config.dryRun || !config.load) {
    logger.log('\n--- Step 3: Skipped (dry-run, nothing written) ---');
    return { observation, inserted: false, dryRun: true };
  }

  logger.log('\n--- Step 3: Loading into database ---');
  const load = config.load;
  const { inserted } = await withRetry(
    () => loadObservation(observation, load, { connect: deps.connect, logger }),
    config.loadRetry,
    { ...retryOptions, label: 'load' }
  );

  return { observation, inserted, dryRun: false };
}
