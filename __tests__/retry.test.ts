import { describe, expect, test, vi } from 'vitest';

import { MalformedRecordError, SinkUnavailableError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { LOAD_RETRY, TRANSFORM_RETRY, isRetryable, withRetry } from '../src/retry.js';

function noSleep() {
  return vi.fn(async (_ms: number) => undefined);
}

describe('withRetry', () => {
  test('returns the first successful result', async () => {
    const sleep = noSleep();
    const operation = vi.fn(async (attempt: number) => `attempt ${attempt}`);

    await expect(
      withRetry(operation, LOAD_RETRY, { label: 'load', logger: silentLogger, sleep })
    ).resolves.toBe('attempt 1');
    expect(sleep).not.toHaveBeenCalled();
  });

  test('retries transient failures with the fixed delay', async () => {
    const sleep = noSleep();
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new SinkUnavailableError('connection reset');
      }
      return 'stored';
    });

    await expect(
      withRetry(operation, LOAD_RETRY, { label: 'load', logger: silentLogger, sleep })
    ).resolves.toBe('stored');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[60_000], [60_000]]);
  });

  test('re-throws the last error unchanged once attempts run out', async () => {
    const errors = [new SinkUnavailableError('one'), new SinkUnavailableError('two'), new SinkUnavailableError('three')];
    const operation = vi.fn(async (attempt: number) => {
      throw errors[attempt - 1];
    });

    await expect(
      withRetry(operation, LOAD_RETRY, { label: 'load', logger: silentLogger, sleep: noSleep() })
    ).rejects.toBe(errors[2]);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test('does not retry non-retryable errors', async () => {
    const error = new MalformedRecordError('humidity 140 is outside [0, 100]');
    const operation = vi.fn(async () => {
      throw error;
    });

    await expect(
      withRetry(operation, LOAD_RETRY, { label: 'load', logger: silentLogger, sleep: noSleep() })
    ).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test('a single-attempt policy never retries', async () => {
    const operation = vi.fn(async () => {
      throw new SinkUnavailableError('down');
    });

    await expect(
      withRetry(operation, TRANSFORM_RETRY, { label: 'transform', logger: silentLogger, sleep: noSleep() })
    ).rejects.toBeInstanceOf(SinkUnavailableError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test('honours a custom shouldRetry', async () => {
    const operation = vi.fn(async (attempt: number) => {
      if (attempt === 1) {
        throw new Error('plain error');
      }
      return attempt;
    });

    await expect(
      withRetry(
        operation,
        { maxAttempts: 2, delayMs: 5, shouldRetry: () => true },
        { label: 'custom', logger: silentLogger, sleep: noSleep() }
      )
    ).resolves.toBe(2);
  });

  test('logs each failed attempt', async () => {
    const warn = vi.fn();
    const logger = { ...silentLogger, warn };
    const operation = vi.fn(async (attempt: number) => {
      if (attempt === 1) {
        throw new SinkUnavailableError('connection reset');
      }
      return 'ok';
    });

    await withRetry(operation, LOAD_RETRY, { label: 'load', logger, sleep: noSleep() });
    expect(warn).toHaveBeenCalledWith(
      '[load] attempt 1/3 failed: connection reset. Retrying in 60000ms...'
    );
  });
});

describe('isRetryable', () => {
  test('reads the retryable flag of stage errors only', () => {
    expect(isRetryable(new SinkUnavailableError('x'))).toBe(true);
    expect(isRetryable(new MalformedRecordError('x'))).toBe(false);
    expect(isRetryable(new Error('x'))).toBe(false);
  });
});
