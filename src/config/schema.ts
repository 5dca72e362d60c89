import { z } from 'zod';

export const DEFAULT_CAPACITY = 5;
export const DEFAULT_REFILL_RATE = 0.5;

const BucketConfigSchema = z.object({
  capacity: z.number().finite().positive(),
  refillRate: z.number().finite().nonnegative(), // tokens per second
});

export type BucketConfig = z.infer<typeof BucketConfigSchema>;

/**
 * Wire shape of POST /update and of the hot-reload config file. Ranges are
 * left to the rate limiter service so every rejected update is counted.
 */
const UpdateRequestSchema = z
  .object({
    capacity: z.number().finite(),
    refill_rate: z.number().finite(),
  })
  .strict();

export type UpdateRequest = z.infer<typeof UpdateRequestSchema>;

const HttpSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  bindAddress: z.string().min(1).default('127.0.0.1'),
  maxBodyBytes: z.number().int().min(64).max(1_048_576).default(16_384),
});

const WatcherSchema = z.object({
  configPath: z.string().min(1).optional(),
  pollIntervalMs: z.number().int().min(100).default(30_000),
});

const ConfigSchema = z.object({
  bucket: BucketConfigSchema.optional().transform(
    v => v ?? { capacity: DEFAULT_CAPACITY, refillRate: DEFAULT_REFILL_RATE },
  ),
  http: HttpSchema.optional().transform(v => HttpSchema.parse(v ?? {})),
  watcher: WatcherSchema.optional().transform(v => WatcherSchema.parse(v ?? {})),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type AppConfig = z.output<typeof ConfigSchema>;

export function toBucketConfig(request: UpdateRequest): BucketConfig {
  return { capacity: request.capacity, refillRate: request.refill_rate };
}

export { ConfigSchema, BucketConfigSchema, UpdateRequestSchema };
