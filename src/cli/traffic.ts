import { setTimeout as delay } from 'node:timers/promises';
import type { AdmissionResponse, LimiterClient } from '../client/limiter-client.js';

const RATE_PATTERN = /^\s*(\d+(?:\.\d*)?|\.\d+)\s*(?:\/\s*(\d+(?:\.\d*)?|\.\d+)\s*)?$/;

/**
 * Parse a refill rate typed as a decimal or a fraction ("0.5", "1/3"),
 * rounded to 4 decimal places.
 */
export function parseRefillRate(raw: string): number {
  const match = RATE_PATTERN.exec(raw);
  if (!match) {
    throw new RangeError(`Not a rate: "${raw}"`);
  }
  const numerator = Number(match[1]);
  const denominator = match[2] === undefined ? 1 : Number(match[2]);
  if (denominator === 0) {
    throw new RangeError(`Division by zero in rate: "${raw}"`);
  }
  return Number((numerator / denominator).toFixed(4));
}

export function parseRequestCount(raw: string): number {
  const count = Number(raw.trim());
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Request count must be a positive integer, got "${raw}"`);
  }
  return count;
}

export function isYes(raw: string): boolean {
  const answer = raw.trim();
  return answer === 'y' || answer === 'Y';
}

export interface TrafficOptions {
  intervalMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
  onResult?: (index: number, result: AdmissionResponse) => void;
}

export interface TrafficSummary {
  admitted: number;
  denied: number;
}

/** Send `count` admission checks one after another, pausing between them. */
export async function sendRequests(
  client: Pick<LimiterClient, 'checkAdmission'>,
  count: number,
  options: TrafficOptions = {},
): Promise<TrafficSummary> {
  const intervalMs = options.intervalMs ?? 500;
  const sleep = options.sleep ?? delay;
  const summary: TrafficSummary = { admitted: 0, denied: 0 };

  for (let i = 1; i <= count; i++) {
    const result = await client.checkAdmission();
    if (result.admitted) summary.admitted++;
    else summary.denied++;
    options.onResult?.(i, result);

    if (i < count && intervalMs > 0) {
      await sleep(intervalMs);
    }
  }
  return summary;
}
