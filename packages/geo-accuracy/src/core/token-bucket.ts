/**
 * Token Bucket
 *
 * ALGORITHM:
 * - Bucket holds tokens (up to capacity)
 * - Tokens refill continuously at `refillRate` per second
 * - Each request consumes N tokens
 * - Burst = bucket capacity
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, explicit types throughout.
 */

export interface TokenBucketConfig {
  /** Bucket capacity (burst size) */
  readonly maxTokens: number;
  /** Tokens added per second */
  readonly refillRate: number;
}

export class TokenBucket {
  protected tokens: number;
  protected lastRefill: number;
  protected readonly maxTokens: number;
  protected readonly refillRate: number;

  constructor(
    config: TokenBucketConfig,
    private readonly now: () => number = Date.now
  ) {
    this.maxTokens = config.maxTokens;
    this.tokens = config.maxTokens; // Start with full bucket
    this.lastRefill = this.now();
    this.refillRate = config.refillRate;
  }

  /**
   * Refill tokens based on elapsed time
   */
  refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;

    this.tokens = Math.min(this.maxTokens, this.tokens + (elapsed / 1000) * this.refillRate);
    this.lastRefill = now;
  }

  /**
   * Consume tokens if available
   *
   * @returns true if tokens consumed, false if insufficient
   */
  consume(cost = 1): boolean {
    this.refill();

    if (this.tokens >= cost) {
      this.tokens -= cost;
      return true;
    }

    return false;
  }

  /**
   * Get remaining whole tokens
   */
  getRemaining(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  /**
   * Milliseconds until `targetTokens` are available
   */
  msUntilRefill(targetTokens = 1): number {
    this.refill();

    const tokensNeeded = Math.max(0, targetTokens - this.tokens);
    if (tokensNeeded === 0) return 0;

    return Math.ceil((tokensNeeded / this.refillRate) * 1000);
  }
}
