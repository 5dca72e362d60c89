import client from 'prom-client';

// Collect default Node.js metrics (GC, event loop, memory)
client.collectDefaultMetrics();

export const admissionChecksTotal = new client.Counter({
  name: 'admission_checks_total',
  help: 'Total admission checks by outcome',
  labelNames: ['result'] as const,
});

export const configUpdatesTotal = new client.Counter({
  name: 'config_updates_total',
  help: 'Total bucket reconfiguration attempts by outcome',
  labelNames: ['result'] as const,
});

export const bucketTokens = new client.Gauge({
  name: 'bucket_tokens',
  help: 'Tokens available after the most recent bucket operation',
});

export const bucketCapacity = new client.Gauge({
  name: 'bucket_capacity',
  help: 'Configured bucket capacity',
});

export const bucketRefillRate = new client.Gauge({
  name: 'bucket_refill_rate',
  help: 'Configured refill rate in tokens per second',
});

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request handling latency in seconds',
  labelNames: ['route', 'status'] as const,
  buckets: [0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.5],
});

export const metricsRegistry = client.register;
