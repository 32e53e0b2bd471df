/**
 * Admin Routes
 *
 *   POST /api/v1/admin/sync  - Run click reconciliation now
 *   GET  /metrics            - Prometheus metrics
 */

import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import type { ClickAggregator, ClickReconciler } from "@shortkit/analytics";
import { getDbMetrics, type DbMetrics } from "@shortkit/db";
import type { SlidingWindowRateLimiter, RateLimiterStats } from "../services/rate-limiter.js";
import type { RateLimitScope } from "../types.js";
// fastify.rateLimit decorator types
import "../middleware/rate-limit.js";

export interface AdminRoutesOptions {
  reconciler: ClickReconciler;
  clicks: ClickAggregator;
  limiters: Record<RateLimitScope, SlidingWindowRateLimiter>;
}

interface MetricsSnapshot {
  db: DbMetrics;
  clicks: { increments: number; dropped: number };
  limiters: { scope: string; stats: RateLimiterStats }[];
}

/**
 * Build Prometheus-compatible metrics string
 */
export function buildPrometheusMetrics(snapshot: MetricsSnapshot): string {
  const lines: string[] = [];

  const metric = (name: string, type: "counter" | "gauge", help: string, samples: [string, number][]) => {
    lines.push(`# HELP shortkit_${name} ${help}`);
    lines.push(`# TYPE shortkit_${name} ${type}`);
    for (const [labels, value] of samples) {
      lines.push(`shortkit_${name}${labels} ${value}`);
    }
  };

  const { db, clicks, limiters } = snapshot;

  metric("db_queries_total", "counter", "Total database queries", [["", db.totalQueries]]);
  metric("db_slow_queries_total", "counter", "Slow database queries", [["", db.slowQueries]]);
  metric("db_errors_total", "counter", "Database errors", [["", db.errors]]);
  metric("db_avg_query_time_ms", "gauge", "Average query time in ms", [["", Number(db.avgQueryTimeMs.toFixed(2))]]);

  metric("click_increments_total", "counter", "Click increments accepted by the fast store", [["", clicks.increments]]);
  metric("click_increments_dropped_total", "counter", "Click increments dropped", [["", clicks.dropped]]);

  const label = (scope: string) => `{scope="${scope}"}`;
  metric(
    "rate_limit_checks_total",
    "counter",
    "Rate limit decisions",
    limiters.map(({ scope, stats }): [string, number] => [label(scope), stats.totalChecks])
  );
  metric(
    "rate_limit_rejected_total",
    "counter",
    "Requests rejected by the rate limiter",
    limiters.map(({ scope, stats }): [string, number] => [label(scope), stats.rejected])
  );
  metric(
    "rate_limit_fail_open_total",
    "counter",
    "Rate limit decisions made without the backing store",
    limiters.map(({ scope, stats }): [string, number] => [label(scope), stats.failOpen])
  );

  return lines.join("\n") + "\n";
}

export const adminRoutes: FastifyPluginAsync<AdminRoutesOptions> = async (
  fastify: FastifyInstance,
  opts: AdminRoutesOptions
) => {
  fastify.post("/api/v1/admin/sync", { preHandler: fastify.rateLimit("default") }, async (request, reply) => {
    const result = await opts.reconciler.runNow();
    if (!result) {
      return reply.status(409).send({ error: "conflict", message: "Click reconciler is stopped" });
    }

    request.log.info({ result }, "On-demand reconciliation completed");
    return reply.status(202).send(result);
  });

  fastify.get("/metrics", async (request, reply) => {
    const body = buildPrometheusMetrics({
      db: getDbMetrics(),
      clicks: opts.clicks.getStats(),
      limiters: Object.values(opts.limiters).map((limiter) => ({ scope: limiter.scope, stats: limiter.getStats() })),
    });
    return reply.header("Content-Type", "text/plain; version=0.0.4").send(body);
  });
};
