/**
 * Rate Limiter (Token Bucket Algorithm)
 *
 * Shared request budget for every worker of a run. Reverse geocoding providers
 * publish a requests-per-second policy; pool size and per-attempt delays keep
 * a run near it, this limiter makes it a hard ceiling.
 *
 * Unlike a rejecting limiter, `acquire()` waits for a token.
 */

import { TokenBucket } from '../core/token-bucket.js';
import { sleep } from '../core/utils/timers.js';

export interface RateLimiterConfig {
  /** Sustained request rate */
  readonly requestsPerSecond: number;
  /** Requests allowed back-to-back after an idle period (default: 1) */
  readonly burstSize?: number;
}

export interface RateLimiterStats {
  readonly acquired: number;
  readonly waited: number;
  readonly totalWaitMs: number;
  readonly availableTokens: number;
}

/**
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ requestsPerSecond: 1 });
 * if (await limiter.acquire(signal)) {
 *   await geocoder.reverseGeocode(lat, lon);
 * }
 * ```
 */
export class RateLimiter {
  private readonly bucket: TokenBucket;
  private acquired = 0;
  private waited = 0;
  private totalWaitMs = 0;

  constructor(config: RateLimiterConfig) {
    this.bucket = new TokenBucket({
      maxTokens: config.burstSize ?? 1,
      refillRate: config.requestsPerSecond,
    });
  }

  /**
   * Wait until a token is available and consume it
   *
   * @returns false if `signal` aborted before a token was obtained
   */
  async acquire(signal?: AbortSignal): Promise<boolean> {
    const startedAt = Date.now();
    let hadToWait = false;

    while (!this.bucket.consume(1)) {
      if (signal?.aborted) {
        return false;
      }
      hadToWait = true;
      await sleep(this.bucket.msUntilRefill(1), signal);
    }

    if (signal?.aborted) {
      return false;
    }

    this.acquired++;
    if (hadToWait) {
      this.waited++;
      this.totalWaitMs += Date.now() - startedAt;
    }
    return true;
  }

  getStats(): RateLimiterStats {
    return {
      acquired: this.acquired,
      waited: this.waited,
      totalWaitMs: this.totalWaitMs,
      availableTokens: this.bucket.getRemaining(),
    };
  }
}

/**
 * Limiter that never waits, for callers that pace requests some other way
 */
export function createUnlimitedRateLimiter(): RateLimiter {
  return new RateLimiter({ requestsPerSecond: Number.MAX_SAFE_INTEGER, burstSize: Number.MAX_SAFE_INTEGER });
}
