import { describe, it, expect, vi } from 'vitest';
import { isYes, parseRefillRate, parseRequestCount, sendRequests } from '../../src/cli/traffic.js';
import type { AdmissionResponse } from '../../src/client/limiter-client.js';

function response(admitted: boolean): AdmissionResponse {
  return { status: admitted ? 200 : 429, admitted, retryAfterS: admitted ? null : 2, latencyMs: 1 };
}

describe('parseRefillRate', () => {
  it.each([
    ['0.5', 0.5],
    ['2', 2],
    ['.25', 0.25],
    ['1/3', 0.3333],
    [' 2 / 3 ', 0.6667],
    ['1/8', 0.125],
  ])('parses %j as %d', (raw, expected) => {
    expect(parseRefillRate(raw)).toBe(expected);
  });

  it.each(['', 'fast', '1/', '-1', '1/2/3'])('rejects %j', (raw) => {
    expect(() => parseRefillRate(raw)).toThrow(RangeError);
  });

  it('rejects division by zero', () => {
    expect(() => parseRefillRate('1/0')).toThrow('Division by zero in rate: "1/0"');
  });
});

describe('parseRequestCount', () => {
  it('accepts a positive integer', () => {
    expect(parseRequestCount(' 12 ')).toBe(12);
  });

  it.each(['0', '-3', '2.5', 'ten', ''])('rejects %j', (raw) => {
    expect(() => parseRequestCount(raw)).toThrow(RangeError);
  });
});

describe('isYes', () => {
  it('accepts y and Y only', () => {
    expect(isYes('y')).toBe(true);
    expect(isYes(' Y\n')).toBe(true);
    expect(isYes('yes')).toBe(false);
    expect(isYes('n')).toBe(false);
  });
});

describe('sendRequests', () => {
  it('sends requests in sequence and tallies the outcomes', async () => {
    const outcomes = [true, true, false, true];
    const checkAdmission = vi.fn(async () => response(outcomes.shift() ?? false));
    const sleep = vi.fn(async () => undefined);
    const seen: Array<[number, number]> = [];

    const summary = await sendRequests({ checkAdmission }, 4, {
      intervalMs: 250,
      sleep,
      onResult: (i, result) => seen.push([i, result.status]),
    });

    expect(summary).toEqual({ admitted: 3, denied: 1 });
    expect(seen).toEqual([[1, 200], [2, 200], [3, 429], [4, 200]]);
    expect(checkAdmission).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it('does not pause when the interval is zero', async () => {
    const sleep = vi.fn(async () => undefined);
    await sendRequests({ checkAdmission: async () => response(true) }, 3, { intervalMs: 0, sleep });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops at the first transport error', async () => {
    const checkAdmission = vi
      .fn<() => Promise<AdmissionResponse>>()
      .mockResolvedValueOnce(response(true))
      .mockRejectedValueOnce(new Error('socket hang up'));

    await expect(
      sendRequests({ checkAdmission }, 5, { intervalMs: 0 }),
    ).rejects.toThrow('socket hang up');
    expect(checkAdmission).toHaveBeenCalledTimes(2);
  });
});
