import { randomUUID } from 'node:crypto';

/** Correlation ID attached to each HTTP request's log lines. */
export function generateRequestId(): string {
  return randomUUID();
}
