import http from 'node:http';
import type { Logger } from 'pino';
import { UpdateRequestSchema, toBucketConfig } from '../config/schema.js';
import type { RateLimiterService } from '../limiter/rate-limiter-service.js';
import { InvalidConfigurationError, formatIssues } from '../limiter/errors.js';
import { metricsRegistry, httpRequestDuration } from '../monitoring/metrics.js';
import { logger, requestLogger } from '../monitoring/logger.js';
import { generateRequestId } from '../utils/id-generator.js';
import { HttpError, readJsonBody } from './body.js';

export const RATE_LIMITED_DETAIL = 'Rate limit exceeded. Try again later.';

export interface HttpServerOptions {
  maxBodyBytes?: number;
}

type RouteHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  log: Logger,
) => Promise<void>;

let isReady = false;

export function setReady(ready: boolean): void {
  isReady = ready;
}

export function createHttpServer(
  service: RateLimiterService,
  options: HttpServerOptions = {},
): http.Server {
  const maxBodyBytes = options.maxBodyBytes ?? 16_384;

  const handleAdmission: RouteHandler = async (_req, res, log) => {
    const decision = await service.checkAdmission();
    const headers: Record<string, string> = {
      'X-RateLimit-Limit': String(decision.capacity),
      'X-RateLimit-Remaining': String(Math.floor(decision.remaining)),
    };

    if (decision.admitted) {
      sendJson(res, 200, { message: 'Rate Limiter Code Challenge!' }, headers);
      return;
    }

    if (decision.retryAfterMs !== null) {
      headers['Retry-After'] = String(Math.ceil(decision.retryAfterMs / 1000));
    }
    log.debug({ remaining: decision.remaining }, 'Admission denied');
    sendJson(res, 429, { detail: RATE_LIMITED_DETAIL }, headers);
  };

  const handleUpdate: RouteHandler = async (req, res, log) => {
    const body = await readJsonBody(req, maxBodyBytes);
    const parsed = UpdateRequestSchema.safeParse(body);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues }, 'Rejected malformed rate limit update');
      sendJson(res, 400, { detail: formatIssues(parsed.error.issues), errors: parsed.error.issues });
      return;
    }

    try {
      const applied = await service.updateConfig(toBucketConfig(parsed.data));
      sendJson(res, 200, {
        message: 'Rate limit updated',
        new_config: { capacity: applied.capacity, refill_rate: applied.refillRate },
      });
    } catch (err) {
      if (err instanceof InvalidConfigurationError) {
        sendJson(res, 400, { detail: err.message, errors: err.issues });
        return;
      }
      throw err;
    }
  };

  const handleConfig: RouteHandler = async (_req, res) => {
    const state = await service.getStatus();
    sendJson(res, 200, {
      capacity: state.capacity,
      refill_rate: state.refillRate,
      tokens: state.tokens,
    });
  };

  const routes: Record<string, Partial<Record<string, RouteHandler>>> = {
    '/': { GET: handleAdmission },
    '/update': { POST: handleUpdate },
    '/config': { GET: handleConfig },
    '/health': {
      GET: async (_req, res) => sendJson(res, 200, { status: 'ok' }),
    },
    '/ready': {
      GET: async (_req, res) => sendJson(res, isReady ? 200 : 503, { ready: isReady }),
    },
    '/metrics': {
      GET: async (_req, res) => {
        const body = await metricsRegistry.metrics();
        res.writeHead(200, { 'Content-Type': metricsRegistry.contentType });
        res.end(body);
      },
    },
  };

  return http.createServer((req, res) => {
    const requestId = generateRequestId();
    const log = requestLogger(requestId, req.method, req.url);
    const path = (req.url ?? '/').split('?')[0] || '/';
    const route = routes[path];
    const endTimer = httpRequestDuration.startTimer();
    res.on('finish', () => {
      endTimer({ route: route ? path : 'unmatched', status: String(res.statusCode) });
    });

    if (!route) {
      sendJson(res, 404, { detail: 'Not found' });
      return;
    }

    const handler = route[req.method ?? 'GET'];
    if (!handler) {
      sendJson(res, 405, { detail: 'Method not allowed' }, { Allow: Object.keys(route).join(', ') });
      return;
    }

    handler(req, res, log).catch((err: unknown) => {
      if (err instanceof HttpError) {
        log.warn({ status: err.status, error: err.message }, 'Rejected request');
        sendJson(res, err.status, { detail: err.message });
        return;
      }
      log.error({ err }, 'Request handling failed');
      if (res.headersSent) {
        res.end();
        return;
      }
      sendJson(res, 500, { detail: 'Internal server error' });
    });
  });
}

export function startHttpServer(
  service: RateLimiterService,
  port: number,
  bindAddress: string,
  options: HttpServerOptions = {},
): Promise<http.Server> {
  const server = createHttpServer(service, options);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, bindAddress, () => {
      server.off('error', reject);
      logger.info({ port, bindAddress }, 'Rate limiter HTTP server listening');
      resolve(server);
    });
  });
}

function sendJson(
  res: http.ServerResponse,
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}
