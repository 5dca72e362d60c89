import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../monitoring/logger.js';

const UpdateResponseSchema = z.object({
  message: z.string(),
  new_config: z.object({
    capacity: z.number(),
    refill_rate: z.number(),
  }),
});

export type UpdateResponse = z.infer<typeof UpdateResponseSchema>;

const ErrorBodySchema = z.object({ detail: z.string() });

export interface AdmissionResponse {
  status: number;
  admitted: boolean;
  /** Seconds from the Retry-After header of a 429, if any. */
  retryAfterS: number | null;
  latencyMs: number;
}

export class LimiterApiError extends Error {
  readonly status: number;

  constructor(status: number, detail: string) {
    super(detail);
    this.name = 'LimiterApiError';
    this.status = status;
  }
}

/** HTTP client for a running rate limiter service. */
export class LimiterClient {
  private http: AxiosInstance;

  constructor(baseUrl: string, timeoutMs = 5_000) {
    this.http = axios.create({
      baseURL: baseUrl,
      timeout: timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async checkAdmission(): Promise<AdmissionResponse> {
    const startMs = Date.now();
    try {
      const response = await this.http.get('/');
      return { status: response.status, admitted: true, retryAfterS: null, latencyMs: Date.now() - startMs };
    } catch (error: unknown) {
      if (axios.isAxiosError(error) && error.response?.status === 429) {
        const retryAfter = error.response.headers['retry-after'];
        return {
          status: 429,
          admitted: false,
          retryAfterS: retryAfter === undefined ? null : Number(retryAfter),
          latencyMs: Date.now() - startMs,
        };
      }
      throw toApiError(error);
    }
  }

  async updateConfig(capacity: number, refillRate: number): Promise<UpdateResponse> {
    try {
      const response = await this.http.post('/update', { capacity, refill_rate: refillRate });
      const parsed = UpdateResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new LimiterApiError(response.status, 'Unexpected response from /update');
      }
      logger.debug({ newConfig: parsed.data.new_config }, 'Rate limit update accepted');
      return parsed.data;
    } catch (error: unknown) {
      throw toApiError(error);
    }
  }
}

function toApiError(error: unknown): Error {
  if (axios.isAxiosError(error) && error.response) {
    const body = ErrorBodySchema.safeParse(error.response.data);
    const detail = body.success ? body.data.detail : `Request failed with status ${error.response.status}`;
    logger.debug({ status: error.response.status, detail }, 'Rate limiter API error');
    return new LimiterApiError(error.response.status, detail);
  }
  // Network/timeout errors pass through unchanged
  return error instanceof Error ? error : new Error(String(error));
}
