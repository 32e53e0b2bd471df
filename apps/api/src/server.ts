/**
 * Shortkit API Server
 *
 * Process entry point: loads configuration, connects the stores, wires the
 * services, starts the click reconciler and listens.
 *
 * Endpoints:
 *   POST /api/v1/shorten        - Create short URL
 *   GET  /api/v1/stats/:code    - Click statistics
 *   POST /api/v1/admin/sync     - Run click reconciliation now
 *   GET  /:code                 - Redirect
 *   GET  /health, /health/ready - Health checks
 *   GET  /metrics               - Prometheus metrics
 *
 * Shutdown (SIGINT/SIGTERM): stop accepting requests, flush background
 * click increments, run the final reconciliation, close Redis and the pool.
 */

import { logger } from "@shortkit/logger";
import { UrlCache, createRedisFastStore } from "@shortkit/cache";
import { PostgresUrlRepository, createPool, disconnectDb, fromPool, instrument } from "@shortkit/db";
import { ClickAggregator, ClickReconciler } from "@shortkit/analytics";

import { buildApp } from "./app.js";
import { loadConfig, validateConfig } from "./config.js";
import { LinkService } from "./services/links.js";
import { SlidingWindowRateLimiter } from "./services/rate-limiter.js";

async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  // ==========================================================================
  // Stores
  // ==========================================================================

  const pool = createPool({
    connectionString: config.databaseUrl,
    max: config.dbPoolMax,
    min: config.dbPoolMin,
    timeoutMs: config.dbTimeoutMs,
  });
  const repository = new PostgresUrlRepository(instrument(fromPool(pool)));

  const { store } = createRedisFastStore({
    url: config.redisUrl,
    commandTimeout: config.redisTimeoutMs,
  });

  if (!(await repository.ping())) {
    throw new Error("Database connection failed");
  }
  logger.info("Database connection verified");

  // ==========================================================================
  // Services
  // ==========================================================================

  const clicks = new ClickAggregator(store, { incrementTimeoutMs: config.clickIncrementTimeoutMs });
  const reconciler = new ClickReconciler(clicks, repository, {
    intervalMs: config.clickSyncIntervalMs,
    runTimeoutMs: config.clickSyncTimeoutMs,
  });
  const links = new LinkService({
    repository,
    cache: new UrlCache(store, { ttlSeconds: config.cacheTtlSeconds }),
    clicks,
    baseUrl: config.baseUrl,
    shortCodeLength: config.shortCodeLength,
  });
  const limiters = {
    default: new SlidingWindowRateLimiter(store, config.rateLimits.default, { scope: "default" }),
    create: new SlidingWindowRateLimiter(store, config.rateLimits.create, { scope: "create" }),
  };

  const app = await buildApp({
    links,
    clicks,
    reconciler,
    limiters,
    health: {
      database: () => repository.ping(),
      cache: () => store.ping(),
    },
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === "development"
          ? { target: "pino-pretty", options: { colorize: true } }
          : undefined,
    },
    trustedProxies: config.trustedProxies,
    contentSecurityPolicy: config.nodeEnv === "production",
  });

  // ==========================================================================
  // Graceful Shutdown
  // ==========================================================================

  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");

    try {
      await app.close();
      logger.info("HTTP server closed");

      await links.settle();
      const finalRun = await reconciler.stop();
      logger.info({ result: finalRun }, "Final click reconciliation complete");

      await store.disconnect();
      logger.info("Redis connection closed");

      await disconnectDb(pool);
      logger.info("Database pool closed");

      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

  // ==========================================================================
  // Start
  // ==========================================================================

  reconciler.start();
  await app.listen({ port: config.port, host: config.host });
  logger.info(`Shortkit API running on http://${config.host}:${config.port}`);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start server");
  process.exit(1);
});
