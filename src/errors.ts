/**
 * Error taxonomy for the weather ETL job.
 *
 * Every stage failure is an EtlError carrying the stage that raised it and
 * whether a retry could help. The retry wrapper reads `retryable`; the
 * coordinator re-throws whatever the last attempt raised.
 */

export type EtlStage = 'extract' | 'transform' | 'load';

export class EtlError extends Error {
  readonly stage: EtlStage;
  readonly retryable: boolean;

  constructor(
    message: string,
    stage: EtlStage,
    retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EtlError';
    this.stage = stage;
    this.retryable = retryable;
  }
}

/**
 * The weather API could not be reached or answered with a non-2xx status.
 * `status` is set when an HTTP response was received.
 */
export class SourceUnavailableError extends EtlError {
  readonly status: number | null;

  constructor(
    message: string,
    options: { status?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, 'extract', options.retryable ?? true, { cause: options.cause });
    this.name = 'SourceUnavailableError';
    this.status = options.status ?? null;
  }
}

/**
 * The record is missing required fields or carries out-of-range values.
 * Signals an upstream contract break, so it is never retried.
 */
export class MalformedRecordError extends EtlError {
  constructor(message: string, stage: 'extract' | 'transform' = 'transform') {
    super(message, stage, false);
    this.name = 'MalformedRecordError';
  }
}

/** Postgres connection or statement failure; the transaction was rolled back. */
export class SinkUnavailableError extends EtlError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, 'load', true, options);
    this.name = 'SinkUnavailableError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
