/**
 * PostgreSQL Pool
 *
 * One pg.Pool per process, wrapped in an instrumented `Queryable` that
 * tracks query timing. Repositories only see `Queryable`, so tests can
 * substitute a fake without importing pg.
 *
 * Usage:
 * ```ts
 * import { createPool, instrument, PostgresUrlRepository } from "@shortkit/db";
 *
 * const pool = createPool({ connectionString: config.databaseUrl });
 * const urls = new PostgresUrlRepository(instrument(fromPool(pool)));
 * ```
 */

import { Pool, type QueryResultRow } from "pg";
import { createLogger } from "@shortkit/logger";

const log = createLogger("db");

// =============================================================================
// Types
// =============================================================================

/**
 * Minimal query interface (what repositories actually use)
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
}

export interface PoolOptions {
  connectionString: string;
  /** Maximum connections in pool (default: 25) */
  max?: number;
  /** Minimum idle connections (default: 5) */
  min?: number;
  /** Statement and client-side query timeout in ms (default: 5000) */
  timeoutMs?: number;
}

/**
 * Database metrics for monitoring
 */
export interface DbMetrics {
  totalQueries: number;
  slowQueries: number;
  errors: number;
  avgQueryTimeMs: number;
}

// =============================================================================
// Metrics
// =============================================================================

const metrics: DbMetrics = {
  totalQueries: 0,
  slowQueries: 0,
  errors: 0,
  avgQueryTimeMs: 0,
};

// Slow query threshold (ms)
const SLOW_QUERY_THRESHOLD_MS = 100;

function recordQuery(durationMs: number, failed: boolean): void {
  metrics.totalQueries++;
  metrics.avgQueryTimeMs =
    (metrics.avgQueryTimeMs * (metrics.totalQueries - 1) + durationMs) / metrics.totalQueries;

  if (failed) {
    metrics.errors++;
  }
  if (durationMs > SLOW_QUERY_THRESHOLD_MS) {
    metrics.slowQueries++;
  }
}

/**
 * Get database query metrics
 */
export function getDbMetrics(): DbMetrics {
  return { ...metrics };
}

/**
 * Reset metrics (for testing)
 */
export function resetDbMetrics(): void {
  metrics.totalQueries = 0;
  metrics.slowQueries = 0;
  metrics.errors = 0;
  metrics.avgQueryTimeMs = 0;
}

// =============================================================================
// Pool
// =============================================================================

export function createPool(options: PoolOptions): Pool {
  const { connectionString, max = 25, min = 5, timeoutMs = 5000 } = options;

  const pool = new Pool({
    connectionString,
    max,
    min,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    statement_timeout: timeoutMs,
    query_timeout: timeoutMs,
  });

  // Idle client errors would otherwise crash the process
  pool.on("error", (err) => log.error({ err }, "Idle client error"));

  return pool;
}

/**
 * Adapt a pg.Pool to the Queryable interface.
 */
export function fromPool(pool: Pool): Queryable {
  return {
    query: (text, values) => pool.query(text, values),
  };
}

/**
 * Wrap any Queryable (normally a pg.Pool) with timing metrics and
 * slow-query logging.
 */
export function instrument(target: Queryable): Queryable {
  return {
    async query(text, values) {
      const start = performance.now();
      try {
        const result = await target.query(text, values);
        const duration = performance.now() - start;
        recordQuery(duration, false);
        if (duration > SLOW_QUERY_THRESHOLD_MS) {
          log.warn({ durationMs: Math.round(duration), query: text.trim().split("\n")[0] }, "Slow query");
        }
        return result;
      } catch (err) {
        recordQuery(performance.now() - start, true);
        throw err;
      }
    },
  };
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Check database connectivity
 */
export async function checkDbConnection(db: Queryable): Promise<boolean> {
  try {
    await db.query("SELECT 1");
    return true;
  } catch (err) {
    log.warn({ err }, "Database ping failed");
    return false;
  }
}

/**
 * Gracefully drain the pool
 */
export async function disconnectDb(pool: Pool): Promise<void> {
  await pool.end();
}
