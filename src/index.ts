#!/usr/bin/env node
import { loadConfig } from './config/index.js';
import { ConfigWatcher } from './config/config-watcher.js';
import { RateLimiterService } from './limiter/rate-limiter-service.js';
import { startHttpServer, setReady } from './http/server.js';
import { logger } from './monitoring/logger.js';

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  logger.info({ bucket: config.bucket, http: config.http }, 'Configuration loaded');

  const service = new RateLimiterService({ config: config.bucket });

  const httpServer = await startHttpServer(service, config.http.port, config.http.bindAddress, {
    maxBodyBytes: config.http.maxBodyBytes,
  });

  // Optional hot reload of capacity/refill rate from a JSON file
  let watcher: ConfigWatcher | null = null;
  if (config.watcher.configPath) {
    watcher = new ConfigWatcher({
      configPath: config.watcher.configPath,
      service,
      pollIntervalMs: config.watcher.pollIntervalMs,
    });
    watcher.start();
  }

  setReady(true);

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    setReady(false);
    watcher?.stop();

    httpServer.close((err) => {
      if (err) {
        logger.error({ err }, 'HTTP server did not close cleanly');
        process.exit(1);
      }
      logger.info('Shutdown complete');
      process.exit(0);
    });
    httpServer.closeIdleConnections();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
