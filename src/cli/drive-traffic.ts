#!/usr/bin/env node
/**
 * Interactive traffic driver for a running rate limiter.
 * Optionally updates the limit, then sends a burst of GET / requests and
 * prints each status code.
 *
 * Usage:
 *  npm run traffic
 *  env vars: LIMITER_URL (default http://127.0.0.1:8000), TRAFFIC_INTERVAL_MS (default 500)
 */
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { LimiterClient, LimiterApiError } from '../client/limiter-client.js';
import { isYes, parseRefillRate, parseRequestCount, sendRequests } from './traffic.js';

async function main() {
  const baseUrl = process.env.LIMITER_URL || 'http://127.0.0.1:8000';
  const intervalMs = Number(process.env.TRAFFIC_INTERVAL_MS || '500');
  const client = new LimiterClient(baseUrl);
  const rl = readline.createInterface({ input, output });

  try {
    if (isYes(await rl.question('Update rate limit before testing? (y/n): '))) {
      const capacity = Number(await rl.question('Enter new capacity: '));
      const refillRate = parseRefillRate(
        await rl.question('Enter new refill_rate (tokens/sec, supports fractions like 1/3): '),
      );
      console.log(`Parsed refill_rate: ${refillRate.toFixed(4)}`);
      console.log(`Updating rate limit to capacity=${capacity}, refill_rate=${refillRate}...`);

      try {
        const result = await client.updateConfig(capacity, refillRate);
        console.log(JSON.stringify(result, null, 2));
      } catch (err) {
        if (!(err instanceof LimiterApiError)) throw err;
        console.log(`Update rejected (${err.status}): ${err.message}`);
      }
    }

    const count = parseRequestCount(
      await rl.question(`How many test requests should we send to GET ${baseUrl}/ ? `),
    );
    console.log(`Sending ${count} requests to ${baseUrl}/ ...`);

    const summary = await sendRequests(client, count, {
      intervalMs,
      onResult: (i, result) => console.log(`[${i}] Status: ${result.status}`),
    });
    console.log(`Done: ${summary.admitted} admitted, ${summary.denied} denied`);
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
