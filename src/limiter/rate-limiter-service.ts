import type { BucketConfig } from '../config/schema.js';
import { monotonicClock, type Clock } from '../utils/clock.js';
import { SerialLock } from '../utils/serial-lock.js';
import { logger } from '../monitoring/logger.js';
import * as metrics from '../monitoring/metrics.js';
import { InvalidConfigurationError } from './errors.js';
import {
  TokenBucket,
  parseBucketConfig,
  type BucketState,
  type ConsumeResult,
} from './token-bucket.js';

export interface RateLimiterServiceOptions {
  config: BucketConfig;
  clock?: Clock;
}

export type AdmissionDecision = ConsumeResult & { capacity: number };

/**
 * Owns the process's single token bucket. Every read or write of the bucket
 * goes through one SerialLock, so refill+consume and refill+reconfigure are
 * each observed as a single step by every other caller.
 */
export class RateLimiterService {
  private readonly bucket: TokenBucket;
  private readonly clock: Clock;
  private readonly lock = new SerialLock();

  constructor(options: RateLimiterServiceOptions) {
    this.clock = options.clock ?? monotonicClock;
    this.bucket = new TokenBucket(options.config, this.clock.now());
    this.publishConfig(this.bucket.config());
    metrics.bucketTokens.set(options.config.capacity);
    logger.info(options.config, 'Token bucket initialized');
  }

  checkAdmission(): Promise<AdmissionDecision> {
    return this.lock.runExclusive(() => {
      const result = this.bucket.tryConsume(this.clock.now());
      metrics.admissionChecksTotal.inc({ result: result.admitted ? 'admitted' : 'denied' });
      metrics.bucketTokens.set(result.remaining);
      return { ...result, capacity: this.bucket.config().capacity };
    });
  }

  /**
   * Apply a new capacity and refill rate. Tokens accrued so far are credited
   * at the old rate before the switch. Rejects with InvalidConfigurationError
   * and leaves the bucket as it was if the values are out of range.
   */
  updateConfig(next: BucketConfig): Promise<BucketConfig> {
    return this.lock.runExclusive(() => {
      let valid: BucketConfig;
      try {
        valid = parseBucketConfig(next.capacity, next.refillRate);
      } catch (err) {
        if (err instanceof InvalidConfigurationError) {
          metrics.configUpdatesTotal.inc({ result: 'rejected' });
          logger.warn({ requested: next, issues: err.issues }, 'Rate limit update rejected');
        }
        throw err;
      }

      const previous = this.bucket.config();
      this.bucket.refill(this.clock.now());
      const applied = this.bucket.updateConfig(valid.capacity, valid.refillRate);

      const { tokens } = this.bucket.snapshot();
      metrics.configUpdatesTotal.inc({ result: 'applied' });
      metrics.bucketTokens.set(tokens);
      this.publishConfig(applied);
      logger.info({ previous, applied, tokens }, 'Rate limit updated');
      return applied;
    });
  }

  /** Current state, refilled up to now. */
  getStatus(): Promise<BucketState> {
    return this.lock.runExclusive(() => {
      this.bucket.refill(this.clock.now());
      const state = this.bucket.snapshot();
      metrics.bucketTokens.set(state.tokens);
      return state;
    });
  }

  private publishConfig(config: BucketConfig): void {
    metrics.bucketCapacity.set(config.capacity);
    metrics.bucketRefillRate.set(config.refillRate);
  }
}
