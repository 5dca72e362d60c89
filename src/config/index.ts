import { parseArgs } from 'node:util';
import dotenv from 'dotenv';
import {
  ConfigSchema,
  DEFAULT_CAPACITY,
  DEFAULT_REFILL_RATE,
  type AppConfig,
} from './schema.js';

dotenv.config();

type Env = Record<string, string | undefined>;

/**
 * Build the application config from command-line flags and environment.
 * Flags take precedence over env vars; both fall back to schema defaults.
 *
 * Throws a TypeError for unknown flags and a ZodError for invalid values.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): AppConfig {
  const { values: flags } = parseArgs({
    args: argv,
    options: {
      capacity: { type: 'string' },
      refill_rate: { type: 'string' },
      port: { type: 'string' },
      host: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  const rawConfig = {
    bucket: {
      capacity: num(flags.capacity ?? env.BUCKET_CAPACITY, DEFAULT_CAPACITY),
      refillRate: num(flags.refill_rate ?? env.BUCKET_REFILL_RATE, DEFAULT_REFILL_RATE),
    },
    http: {
      port: num(flags.port ?? env.HTTP_PORT, 8000),
      bindAddress: flags.host || env.HTTP_BIND_ADDRESS || '127.0.0.1',
      maxBodyBytes: num(env.HTTP_MAX_BODY_BYTES, 16_384),
    },
    watcher: {
      configPath: env.BUCKET_CONFIG_PATH || undefined,
      pollIntervalMs: num(env.CONFIG_POLL_INTERVAL_MS, 30_000),
    },
    logLevel: env.LOG_LEVEL || 'info',
  };

  return ConfigSchema.parse(rawConfig);
}

// Unparseable input becomes NaN so the schema reports it instead of silently defaulting
function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}
