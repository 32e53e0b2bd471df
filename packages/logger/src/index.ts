/**
 * @shortkit/logger - Structured Logging Package
 *
 * Consistent JSON logging for every Shortkit component, built on pino.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@shortkit/logger";
 *
 * logger.info({ shortCode: "00001A" }, "Short URL created");
 *
 * const syncLogger = createLogger("click-sync");
 * syncLogger.error({ err }, "Reconciliation run failed");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "shortkit";

// ============================================================================
// Logger Factory
// ============================================================================

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Create a logger instance for a specific component
 */
export function createLogger(name: string): Logger {
  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  });
}

/**
 * Logger that drops everything. Handy for tests and for components
 * constructed before logging is configured.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

// ============================================================================
// Default Logger Instance
// ============================================================================

export const logger = createLogger("main");
