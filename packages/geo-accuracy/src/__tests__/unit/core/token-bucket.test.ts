/**
 * Token Bucket Tests
 *
 * Uses an injected clock; no real waiting.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TokenBucket } from '../../../core/token-bucket.js';

describe('TokenBucket', () => {
  let now: number;
  let bucket: TokenBucket;

  beforeEach(() => {
    now = 1_000_000;
    bucket = new TokenBucket({ maxTokens: 2, refillRate: 1 }, () => now);
  });

  it('should start full and allow a burst up to capacity', () => {
    expect(bucket.consume()).toBe(true);
    expect(bucket.consume()).toBe(true);
    expect(bucket.consume()).toBe(false);
  });

  it('should refill continuously', () => {
    bucket.consume(2);
    expect(bucket.msUntilRefill(1)).toBe(1000);

    now += 500;
    expect(bucket.getRemaining()).toBe(0);
    expect(bucket.msUntilRefill(1)).toBe(500);

    now += 500;
    expect(bucket.consume()).toBe(true);
  });

  it('should never exceed capacity', () => {
    now += 60_000;
    expect(bucket.getRemaining()).toBe(2);
  });

  it('should report zero wait when tokens are available', () => {
    expect(bucket.msUntilRefill(1)).toBe(0);
  });
});
