/**
 * Fixed-delay retry wrapper used around the extract and load stages.
 *
 * Usage:
 *   import { withRetry, EXTRACT_RETRY } from './retry.js';
 *   const raw = await withRetry(() => extractWeather(config), EXTRACT_RETRY, { label: 'extract' });
 */

import { EtlError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';

export interface RetryPolicy {
  /** Total attempts, including the first call. */
  maxAttempts: number;
  /** Fixed pause between attempts. */
  delayMs: number;
  /** Decides whether an error is transient. Defaults to the EtlError `retryable` flag. */
  shouldRetry?: (error: unknown) => boolean;
}

export interface RetryOptions {
  label: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/** Initial call plus 2 retries, 30s apart. */
export const EXTRACT_RETRY: RetryPolicy = { maxAttempts: 3, delayMs: 30_000 };

/** Deterministic stage; one attempt only. */
export const TRANSFORM_RETRY: RetryPolicy = { maxAttempts: 1, delayMs: 0 };

/** 3 attempts, 60s apart, to ride out short database outages. */
export const LOAD_RETRY: RetryPolicy = { maxAttempts: 3, delayMs: 60_000 };

export function isRetryable(error: unknown): boolean {
  return error instanceof EtlError && error.retryable;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const logger = options.logger ?? console;
  const pause = options.sleep ?? sleep;
  const shouldRetry = policy.shouldRetry ?? isRetryable;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      logger.warn(
        `[${options.label}] attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}. ` +
          `Retrying in ${policy.delayMs}ms...`
      );
      await pause(policy.delayMs);
    }
  }
}
