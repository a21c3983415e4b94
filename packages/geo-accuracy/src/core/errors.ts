/**
 * geo-accuracy Error Types
 *
 * Remote failures are split into transient (retried) and permanent (recorded
 * immediately). Persistence failures halt a run; everything below the batch
 * level is captured as a row status instead of thrown.
 */

/**
 * Reverse geocoding call timed out (TransientRemoteError)
 *
 * Retried with backoff until the attempt ceiling, then recorded as `timeout`.
 */
export class GeocodeTimeoutError extends Error {
  constructor(
    message: string,
    public readonly latitude: number,
    public readonly longitude: number,
    public readonly timeoutMs?: number
  ) {
    super(message);
    this.name = 'GeocodeTimeoutError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GeocodeTimeoutError);
    }
  }
}

/**
 * Any non-timeout geocoder failure (PermanentRemoteError)
 *
 * Recorded as `error` without spending the remaining attempts.
 */
export class GeocodeServiceError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'GeocodeServiceError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GeocodeServiceError);
    }
  }
}

/**
 * Checkpoint write failed
 *
 * RECOVERY:
 * - Fix the output location (permissions, disk space) and re-run
 * - Rows of the failed batch are redone on the next run, earlier batches are
 *   already in the previous checkpoint
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'PersistenceError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PersistenceError);
    }
  }
}

/**
 * Dataset file could not be parsed into rows
 */
export class DatasetFormatError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number
  ) {
    super(message);
    this.name = 'DatasetFormatError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatasetFormatError);
    }
  }
}

/**
 * Options record or config file failed validation
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }

  /**
   * Get formatted summary of validation issues
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
