import pino, { type Logger } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'token-bucket-gateway' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});

/** Child logger carrying one HTTP request's correlation fields. */
export function requestLogger(requestId: string, method?: string, url?: string): Logger {
  return logger.child({ requestId, method, url });
}
