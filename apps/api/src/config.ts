/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 *
 * Fail fast on startup if required vars are missing or malformed.
 */

import { logger, type LogLevel } from "@shortkit/logger";
import { CACHE_TTL, CLICK_SYNC, RATE_LIMIT, SHORTCODE_CONFIG, parseDuration } from "@shortkit/shared";
import type { Config } from "./types.js";

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

/**
 * Get required environment variable or throw.
 */
function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse a non-negative integer with default. Throws on malformed values.
 */
function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse a duration such as "1h" or "90s" to ms, with default.
 */
function optionalDuration(env: Env, name: string, defaultMs: number): number {
  const value = env[name];
  if (!value) return defaultMs;
  try {
    return parseDuration(value);
  } catch (err) {
    throw new Error(`${name} is not a valid duration: "${value}"`, { cause: err });
  }
}

/**
 * Parse a comma-separated list with default.
 */
function optionalList(env: Env, name: string, defaultValue: readonly string[]): string[] {
  const value = env[name];
  if (!value) return [...defaultValue];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Loopback and private ranges: the load balancers in front of the service */
export const DEFAULT_TRUSTED_PROXIES: readonly string[] = [
  "127.0.0.1",
  "10.0.0.0/8",
  "172.16.0.0/12",
  "192.168.0.0/16",
];

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function parseLogLevel(level: string): LogLevel {
  const normalized = level.toLowerCase();
  return LOG_LEVELS.find((l) => l === normalized) ?? "info";
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing or values are malformed
 */
export function loadConfig(env: Env = process.env): Config {
  const port = optionalInt(env, "PORT", 8080);

  const config: Config = {
    nodeEnv: optional(env, "NODE_ENV", "development"),

    // Server
    port,
    host: optional(env, "HOST", "0.0.0.0"),
    baseUrl: optional(env, "BASE_URL", `http://localhost:${port}`).replace(/\/+$/, ""),
    trustedProxies: optionalList(env, "TRUSTED_PROXIES", DEFAULT_TRUSTED_PROXIES),

    // Database
    databaseUrl: required(env, "DATABASE_URL"),
    dbPoolMax: optionalInt(env, "DB_POOL_MAX", 25),
    dbPoolMin: optionalInt(env, "DB_POOL_MIN", 5),
    dbTimeoutMs: optionalInt(env, "DB_TIMEOUT_MS", 5000),

    // Redis
    redisUrl: required(env, "REDIS_URL"),
    redisTimeoutMs: optionalInt(env, "REDIS_TIMEOUT_MS", 1000),

    // Links
    cacheTtlSeconds: optionalInt(env, "CACHE_TTL_SECONDS", CACHE_TTL.URL_SECONDS),
    shortCodeLength: optionalInt(env, "SHORT_CODE_LENGTH", SHORTCODE_CONFIG.MIN_LENGTH),

    // Rate limiting
    rateLimits: {
      default: {
        requests: optionalInt(env, "RATE_LIMIT_REQUESTS", RATE_LIMIT.DEFAULT.requests),
        windowMs: optionalDuration(env, "RATE_LIMIT_DURATION", RATE_LIMIT.DEFAULT.windowMs),
      },
      create: {
        requests: optionalInt(env, "CREATE_RATE_LIMIT_REQUESTS", RATE_LIMIT.CREATE.requests),
        windowMs: optionalDuration(env, "CREATE_RATE_LIMIT_DURATION", RATE_LIMIT.CREATE.windowMs),
      },
    },

    // Click counting
    clickIncrementTimeoutMs: optionalInt(env, "CLICK_INCREMENT_TIMEOUT_MS", CLICK_SYNC.INCREMENT_TIMEOUT_MS),
    clickSyncIntervalMs: optionalDuration(env, "CLICK_SYNC_INTERVAL", CLICK_SYNC.INTERVAL_MS),
    clickSyncTimeoutMs: optionalDuration(env, "CLICK_SYNC_TIMEOUT", CLICK_SYNC.RUN_TIMEOUT_MS),

    // Logging
    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),
  };

  if (config.shortCodeLength < 1 || config.shortCodeLength > SHORTCODE_CONFIG.MAX_LENGTH) {
    throw new Error(`SHORT_CODE_LENGTH must be between 1 and ${SHORTCODE_CONFIG.MAX_LENGTH}`);
  }
  if (config.clickSyncIntervalMs <= 0) {
    throw new Error("CLICK_SYNC_INTERVAL must be positive");
  }
  for (const [scope, rule] of Object.entries(config.rateLimits)) {
    if (rule.requests < 1 || rule.windowMs <= 0) {
      throw new Error(`Rate limit "${scope}" needs at least 1 request over a positive window`);
    }
  }

  return config;
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings.
 */
export function validateConfig(config: Config): string[] {
  const warnings: string[] = [];

  if (config.clickIncrementTimeoutMs > config.redisTimeoutMs) {
    warnings.push(
      `CLICK_INCREMENT_TIMEOUT_MS=${config.clickIncrementTimeoutMs}ms exceeds REDIS_TIMEOUT_MS; increments will wait for the command timeout`
    );
  }

  if (config.cacheTtlSeconds < 60) {
    warnings.push(`CACHE_TTL_SECONDS=${config.cacheTtlSeconds}s is short. This may cause high DB load.`);
  }

  if (config.clickSyncTimeoutMs >= config.clickSyncIntervalMs) {
    warnings.push("CLICK_SYNC_TIMEOUT is not shorter than CLICK_SYNC_INTERVAL; runs will join each other");
  }

  if (config.dbPoolMin > config.dbPoolMax) {
    warnings.push(`DB_POOL_MIN=${config.dbPoolMin} exceeds DB_POOL_MAX=${config.dbPoolMax}`);
  }

  for (const warning of warnings) {
    logger.warn({ component: "config" }, warning);
  }
  return warnings;
}
