import { BucketConfigSchema, type BucketConfig } from '../config/schema.js';
import { InvalidConfigurationError } from './errors.js';

export interface BucketState extends BucketConfig {
  tokens: number;
  lastRefillTime: number;
}

export type ConsumeResult =
  | { admitted: true; remaining: number }
  | {
      admitted: false;
      remaining: number;
      /** Milliseconds until `cost` tokens are available; null if they never will be. */
      retryAfterMs: number | null;
    };

/**
 * Token bucket with continuous refill.
 * Holds up to `capacity` tokens and refills at `refillRate` tokens per second.
 * Timestamps are monotonic milliseconds supplied by the caller.
 */
export class TokenBucket {
  private capacity: number;
  private refillRate: number;
  private tokens: number;
  private lastRefillTime: number;

  constructor(config: BucketConfig, now: number) {
    const valid = parseBucketConfig(config.capacity, config.refillRate);
    this.capacity = valid.capacity;
    this.refillRate = valid.refillRate;
    this.tokens = valid.capacity;
    this.lastRefillTime = now;
  }

  refill(now: number): void {
    // A clock that moved backward accrues nothing and does not rewind lastRefillTime
    if (now <= this.lastRefillTime) return;
    const elapsedS = (now - this.lastRefillTime) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedS * this.refillRate);
    this.lastRefillTime = now;
  }

  tryConsume(now: number, cost = 1): ConsumeResult {
    if (!Number.isFinite(cost) || cost <= 0) {
      throw new RangeError(`cost must be a positive finite number, got ${cost}`);
    }

    this.refill(now);
    if (this.tokens >= cost) {
      this.tokens -= cost;
      return { admitted: true, remaining: this.tokens };
    }
    return { admitted: false, remaining: this.tokens, retryAfterMs: this.timeUntil(cost) };
  }

  /**
   * Replace capacity and refill rate. Current tokens are clamped to the new
   * capacity, never topped up. Throws InvalidConfigurationError with no state
   * change if either value is out of range.
   */
  updateConfig(newCapacity: number, newRefillRate: number): BucketConfig {
    const valid = parseBucketConfig(newCapacity, newRefillRate);
    this.capacity = valid.capacity;
    this.refillRate = valid.refillRate;
    this.tokens = Math.min(this.tokens, valid.capacity);
    return this.config();
  }

  config(): BucketConfig {
    return { capacity: this.capacity, refillRate: this.refillRate };
  }

  snapshot(): BucketState {
    return {
      capacity: this.capacity,
      refillRate: this.refillRate,
      tokens: this.tokens,
      lastRefillTime: this.lastRefillTime,
    };
  }

  private timeUntil(cost: number): number | null {
    if (cost > this.capacity || this.refillRate === 0) return null;
    return ((cost - this.tokens) / this.refillRate) * 1000;
  }
}

/** Throws InvalidConfigurationError unless capacity > 0 and refillRate >= 0, both finite. */
export function parseBucketConfig(capacity: number, refillRate: number): BucketConfig {
  const result = BucketConfigSchema.safeParse({ capacity, refillRate });
  if (!result.success) {
    throw new InvalidConfigurationError(result.error.issues);
  }
  return result.data;
}
