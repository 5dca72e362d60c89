import { performance } from 'node:perf_hooks';

/** Source of monotonic timestamps in milliseconds. */
export interface Clock {
  now(): number;
}

export const monotonicClock: Clock = {
  now: () => performance.now(),
};
