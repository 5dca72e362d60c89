import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../../src/config/index.js';
import { toBucketConfig, UpdateRequestSchema } from '../../src/config/schema.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig([], {});
    expect(config.bucket).toEqual({ capacity: 5, refillRate: 0.5 });
    expect(config.http).toEqual({ port: 8000, bindAddress: '127.0.0.1', maxBodyBytes: 16384 });
    expect(config.watcher.configPath).toBeUndefined();
    expect(config.watcher.pollIntervalMs).toBe(30000);
    expect(config.logLevel).toBe('info');
  });

  it('reads bucket settings from flags', () => {
    const config = loadConfig(['--capacity', '10', '--refill_rate', '2.5'], {});
    expect(config.bucket).toEqual({ capacity: 10, refillRate: 2.5 });
  });

  it('accepts --flag=value syntax', () => {
    const config = loadConfig(['--capacity=3', '--port=9001', '--host=0.0.0.0'], {});
    expect(config.bucket.capacity).toBe(3);
    expect(config.http.port).toBe(9001);
    expect(config.http.bindAddress).toBe('0.0.0.0');
  });

  it('reads env vars and lets flags override them', () => {
    const env = {
      BUCKET_CAPACITY: '20',
      BUCKET_REFILL_RATE: '4',
      HTTP_PORT: '8100',
      BUCKET_CONFIG_PATH: '/etc/bucket.json',
      CONFIG_POLL_INTERVAL_MS: '1000',
      LOG_LEVEL: 'debug',
    };
    const config = loadConfig(['--capacity', '7'], env);

    expect(config.bucket).toEqual({ capacity: 7, refillRate: 4 });
    expect(config.http.port).toBe(8100);
    expect(config.watcher).toEqual({ configPath: '/etc/bucket.json', pollIntervalMs: 1000 });
    expect(config.logLevel).toBe('debug');
  });

  it('treats blank env vars as unset', () => {
    const config = loadConfig([], { BUCKET_CAPACITY: '  ', BUCKET_CONFIG_PATH: '' });
    expect(config.bucket.capacity).toBe(5);
    expect(config.watcher.configPath).toBeUndefined();
  });

  it('rejects a non-positive capacity', () => {
    expect(() => loadConfig(['--capacity=-1'], {})).toThrow(ZodError);
    expect(() => loadConfig(['--capacity', '0'], {})).toThrow(ZodError);
  });

  it('rejects a negative refill rate', () => {
    expect(() => loadConfig([], { BUCKET_REFILL_RATE: '-0.5' })).toThrow(ZodError);
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig(['--refill_rate', 'fast'], {})).toThrow(ZodError);
  });

  it('rejects unknown flags', () => {
    expect(() => loadConfig(['--burst', '3'], {})).toThrow(TypeError);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig([], { LOG_LEVEL: 'verbose' })).toThrow(ZodError);
  });
});

describe('UpdateRequestSchema', () => {
  it('maps the wire shape onto a bucket config', () => {
    const parsed = UpdateRequestSchema.parse({ capacity: 10, refill_rate: 0.25 });
    expect(toBucketConfig(parsed)).toEqual({ capacity: 10, refillRate: 0.25 });
  });

  it('rejects unknown keys', () => {
    const result = UpdateRequestSchema.safeParse({ capacity: 10, refill_rate: 1, burst: 2 });
    expect(result.success).toBe(false);
  });

  it('leaves range checks to the rate limiter service', () => {
    const result = UpdateRequestSchema.safeParse({ capacity: -1, refill_rate: -0.5 });
    expect(result.success).toBe(true);
  });

  it('rejects non-finite numbers', () => {
    const result = UpdateRequestSchema.safeParse({ capacity: Number.POSITIVE_INFINITY, refill_rate: 1 });
    expect(result.success).toBe(false);
  });

  it('rejects numbers sent as strings', () => {
    const result = UpdateRequestSchema.safeParse({ capacity: '10', refill_rate: 1 });
    expect(result.success).toBe(false);
  });
});
