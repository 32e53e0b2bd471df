/**
 * Health Check Routes
 *
 * Liveness and readiness checks for load balancers and orchestrators.
 */

import type { FastifyInstance, FastifyPluginAsync } from "fastify";

export interface HealthChecks {
  database: () => Promise<boolean>;
  cache: () => Promise<boolean>;
}

export interface HealthRoutesOptions {
  checks: HealthChecks;
}

async function runCheck(check: () => Promise<boolean>): Promise<"ok" | "error"> {
  try {
    return (await check()) ? "ok" : "error";
  } catch {
    return "error";
  }
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify: FastifyInstance,
  opts: HealthRoutesOptions
) => {
  // Liveness - basic server health
  fastify.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Readiness - checks dependencies
  fastify.get("/health/ready", async (request, reply) => {
    const [database, cache] = await Promise.all([runCheck(opts.checks.database), runCheck(opts.checks.cache)]);
    const checks = { database, cache };

    const allHealthy = database === "ok" && cache === "ok";
    if (!allHealthy) {
      request.log.warn({ checks }, "Readiness check degraded");
    }

    return reply.status(allHealthy ? 200 : 503).send({
      status: allHealthy ? "ok" : "degraded",
      checks,
      timestamp: new Date().toISOString(),
    });
  });
};
