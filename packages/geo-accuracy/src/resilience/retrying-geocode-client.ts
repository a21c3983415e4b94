/**
 * Retrying Geocode Client
 *
 * Wraps a `GeocodingService` with a bounded retry loop.
 *
 * DESIGN:
 * - Every attempt yields an explicit `AttemptOutcome`; nothing is decided by
 *   exception unwinding
 * - Geometric pacing: before attempt n (0-based) wait
 *   requestDelayMs * backoffFactor^n, then take a token from the shared limiter
 * - Per-call timeout: a call that does not settle in time is a transient failure
 * - Transient failures (timeouts) are retried; anything else stops the loop
 *
 * LOOP STATES:
 *   waiting -> calling -> (success | no_data | permanent) -> done
 *                      -> transient -> waiting (attempts left) | done (timeout)
 */

import type { GeocodedAddress, LookupFailureStatus } from '../core/types.js';
import { hasAnyAddressField } from '../core/types.js';
import { GeocodeTimeoutError, toError } from '../core/errors.js';
import type { GeocodingService } from '../providers/geocoding-service.js';
import type { RateLimiter } from './rate-limiter.js';
import { raceDeadline, sleep } from '../core/utils/timers.js';
import { logger as rootLogger, type Logger } from '../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of a single call to the geocoding service
 */
export type AttemptOutcome =
  | { readonly kind: 'success'; readonly address: GeocodedAddress }
  | { readonly kind: 'no_data' }
  | { readonly kind: 'transient'; readonly error: Error }
  | { readonly kind: 'permanent'; readonly error: Error };

/**
 * Result of a whole lookup (all attempts)
 */
export type LookupResult =
  | { readonly ok: true; readonly address: GeocodedAddress; readonly attempts: number }
  | {
      readonly ok: false;
      readonly status: LookupFailureStatus;
      readonly attempts: number;
      readonly error?: Error;
    };

export interface RetryPolicy {
  /** Attempt ceiling, first call included (default: 3) */
  readonly maxRetries: number;
  /** Base wait before each attempt (default: 1100) */
  readonly requestDelayMs: number;
  /** Growth of the wait per attempt (default: 1.5) */
  readonly backoffFactor: number;
  /** Single-call timeout (default: 10000) */
  readonly callTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  requestDelayMs: 1100,
  backoffFactor: 1.5,
  callTimeoutMs: 10000,
};

export interface RetryingGeocodeClientOptions {
  readonly policy?: Partial<RetryPolicy>;
  /** Shared per-run request budget */
  readonly rateLimiter?: RateLimiter;
  readonly logger?: Logger;
}

/**
 * What the batch scheduler needs from a lookup client
 */
export interface LocationLookup {
  lookup(latitude: number, longitude: number, signal?: AbortSignal): Promise<LookupResult>;
}

// ============================================================================
// Client
// ============================================================================

export class RetryingGeocodeClient implements LocationLookup {
  private readonly policy: RetryPolicy;
  private readonly rateLimiter?: RateLimiter;
  private readonly log: Logger;

  constructor(
    private readonly service: GeocodingService,
    options: RetryingGeocodeClientOptions = {}
  ) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.rateLimiter = options.rateLimiter;
    this.log = (options.logger ?? rootLogger).child('geocode-client');
  }

  /**
   * Reverse geocode one coordinate pair
   *
   * Never throws for remote failures; they come back as `{ ok: false, status }`.
   * An aborted signal ends the loop with `timeout`.
   */
  async lookup(latitude: number, longitude: number, signal?: AbortSignal): Promise<LookupResult> {
    let lastTransient: Error | undefined;

    for (let attempt = 0; attempt < this.policy.maxRetries; attempt++) {
      await sleep(this.delayBeforeAttempt(attempt), signal);
      if (signal?.aborted) {
        return { ok: false, status: 'timeout', attempts: attempt, error: lastTransient };
      }

      if (this.rateLimiter && !(await this.rateLimiter.acquire(signal))) {
        return { ok: false, status: 'timeout', attempts: attempt, error: lastTransient };
      }

      const outcome = await this.attempt(latitude, longitude, signal);
      const attempts = attempt + 1;

      switch (outcome.kind) {
        case 'success':
          return { ok: true, address: outcome.address, attempts };

        case 'no_data':
          this.log.debug('No address found', { latitude, longitude });
          return { ok: false, status: 'unknown', attempts };

        case 'permanent':
          this.log.warn('Geocoding failed', {
            latitude,
            longitude,
            attempt: attempts,
            error: outcome.error.message,
          });
          return { ok: false, status: 'error', attempts, error: outcome.error };

        case 'transient':
          lastTransient = outcome.error;
          if (signal?.aborted) {
            return { ok: false, status: 'timeout', attempts, error: lastTransient };
          }
          this.log.warn('Geocoding timed out, retrying', {
            latitude,
            longitude,
            attempt: attempts,
            maxAttempts: this.policy.maxRetries,
            nextDelayMs: attempts < this.policy.maxRetries ? this.delayBeforeAttempt(attempts) : null,
          });
          break;
      }
    }

    return {
      ok: false,
      status: 'timeout',
      attempts: this.policy.maxRetries,
      error: lastTransient,
    };
  }

  /**
   * Wait before 0-based attempt n
   */
  delayBeforeAttempt(attempt: number): number {
    return Math.round(this.policy.requestDelayMs * Math.pow(this.policy.backoffFactor, attempt));
  }

  /**
   * One service call, classified
   */
  private async attempt(
    latitude: number,
    longitude: number,
    signal?: AbortSignal
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const race = await raceDeadline(
        this.service.reverseGeocode(latitude, longitude, { signal: controller.signal }),
        this.policy.callTimeoutMs
      );

      if (!race.settled) {
        controller.abort();
        return {
          kind: 'transient',
          error: new GeocodeTimeoutError(
            `Reverse geocoding did not answer within ${this.policy.callTimeoutMs}ms`,
            latitude,
            longitude,
            this.policy.callTimeoutMs
          ),
        };
      }

      const address = race.value?.address;
      if (!address || !hasAnyAddressField(address)) {
        return { kind: 'no_data' };
      }
      return { kind: 'success', address };
    } catch (error) {
      if (error instanceof GeocodeTimeoutError) {
        return { kind: 'transient', error };
      }
      // Cancelled by the caller; the loop exits on the aborted signal
      if (signal?.aborted) {
        return { kind: 'transient', error: toError(error) };
      }
      return { kind: 'permanent', error: toError(error) };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
