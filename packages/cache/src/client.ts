/**
 * Redis Client Factory
 *
 * Creates and configures Redis client instances using ioredis.
 */

import Redis from "ioredis";
import { createLogger } from "@shortkit/logger";

const log = createLogger("redis");

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Command timeout in ms (default: 1000) */
  commandTimeout?: number;
  /** Max retries per request (default: 1) */
  maxRetries?: number;
}

/**
 * Create a configured Redis client.
 *
 * The offline queue is disabled so commands fail fast while disconnected;
 * callers on the acceleration path treat that as a degraded outcome.
 */
export function createRedisClient(options: RedisClientOptions): Redis {
  const {
    url,
    connectTimeout = 5000,
    commandTimeout = 1000,
    maxRetries = 1,
  } = options;

  const client = new Redis(url, {
    connectTimeout,
    commandTimeout,
    maxRetriesPerRequest: maxRetries,

    enableReadyCheck: true,
    enableOfflineQueue: false,
    keepAlive: 10000,

    // Keep reconnecting with capped backoff; the engine fails open meanwhile
    retryStrategy: (times) => Math.min(times * 100, 2000),
  });

  client.on("connect", () => log.info("Connected"));
  client.on("error", (err: Error) => log.warn({ err: err.message }, "Redis error"));
  client.on("close", () => log.debug("Connection closed"));

  return client;
}
