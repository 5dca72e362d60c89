import fs from 'node:fs';
import crypto from 'node:crypto';
import { UpdateRequestSchema, toBucketConfig } from './schema.js';
import type { RateLimiterService } from '../limiter/rate-limiter-service.js';
import { InvalidConfigurationError } from '../limiter/errors.js';
import { logger } from '../monitoring/logger.js';

interface ConfigWatcherOptions {
  configPath: string;
  service: RateLimiterService;
  pollIntervalMs?: number;
}

/**
 * Polls a JSON file of the form {"capacity": n, "refill_rate": n} and applies
 * it to the bucket whenever the content changes.
 */
export class ConfigWatcher {
  private readonly configPath: string;
  private readonly service: RateLimiterService;
  private readonly pollIntervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastContentHash = '';

  constructor(options: ConfigWatcherOptions) {
    this.configPath = options.configPath;
    this.service = options.service;
    this.pollIntervalMs = options.pollIntervalMs ?? 30_000;
  }

  start(): void {
    // The initial bucket comes from flags/env; only later edits are applied
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      this.lastContentHash = this.hash(content);
    } catch (err) {
      logger.warn(
        { configPath: this.configPath, error: String(err) },
        'Config watcher: file not readable yet, will apply it once it appears',
      );
    }

    this.timer = setInterval(() => {
      this.check().catch((err: unknown) => {
        logger.error({ err }, 'Config watcher: reload failed');
      });
    }, this.pollIntervalMs);
    this.timer.unref();

    logger.info(
      { configPath: this.configPath, pollIntervalMs: this.pollIntervalMs },
      'Config watcher started',
    );
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Apply the file now, even if unchanged. Resolves true if it was applied. */
  forceReload(): Promise<boolean> {
    return this.check(true);
  }

  private async check(force = false): Promise<boolean> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.configPath, 'utf-8');
    } catch (err) {
      logger.error(
        { configPath: this.configPath, error: String(err) },
        'Config watcher: failed to read config file (keeping current config)',
      );
      return false;
    }

    const contentHash = this.hash(content);
    if (!force && contentHash === this.lastContentHash) {
      return false;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      logger.error(
        { error: String(err) },
        'Config watcher: invalid JSON (keeping current config)',
      );
      return false;
    }

    const result = UpdateRequestSchema.safeParse(parsed);
    if (!result.success) {
      logger.error(
        { errors: result.error.issues },
        'Config watcher: validation failed (keeping current config)',
      );
      return false;
    }

    try {
      await this.service.updateConfig(toBucketConfig(result.data));
    } catch (err) {
      if (!(err instanceof InvalidConfigurationError)) throw err;
      logger.error(
        { errors: err.issues },
        'Config watcher: values out of range (keeping current config)',
      );
      return false;
    }
    this.lastContentHash = contentHash;
    return true;
  }

  private hash(content: string): string {
    return crypto.createHash('sha256').update(content).digest('hex');
  }
}
