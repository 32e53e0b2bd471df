/**
 * Application Factory
 *
 * Builds the Fastify instance from already-constructed services. Does not
 * listen; `server.ts` does that, tests use `inject`.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import type { ClickAggregator, ClickReconciler } from "@shortkit/analytics";

import { DEFAULT_TRUSTED_PROXIES } from "./config.js";
import { registerErrorHandler } from "./errors.js";
import { rateLimitPlugin } from "./middleware/rate-limit.js";
import { healthRoutes, type HealthChecks } from "./routes/health.js";
import { linksRoutes } from "./routes/links.js";
import { adminRoutes } from "./routes/admin.js";
import type { LinkService } from "./services/links.js";
import type { SlidingWindowRateLimiter } from "./services/rate-limiter.js";
import type { RateLimitScope } from "./types.js";

export interface AppDeps {
  links: LinkService;
  clicks: ClickAggregator;
  reconciler: ClickReconciler;
  limiters: Record<RateLimitScope, SlidingWindowRateLimiter>;
  health: HealthChecks;

  /** Proxies whose X-Forwarded-For sets request.ip (default: loopback and private ranges) */
  trustedProxies?: readonly string[];

  /** Fastify logger options; false disables request logging */
  logger?: FastifyServerOptions["logger"];
  /** Allowed CORS origin (default: reflect request origin) */
  corsOrigin?: string | boolean;
  /** Enable Content-Security-Policy (default: false) */
  contentSecurityPolicy?: boolean;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: deps.logger ?? false,
    trustProxy: [...(deps.trustedProxies ?? DEFAULT_TRUSTED_PROXIES)],
    requestIdHeader: "x-request-id",
  });

  // ==========================================================================
  // Plugins
  // ==========================================================================

  await fastify.register(helmet, {
    contentSecurityPolicy: deps.contentSecurityPolicy ?? false,
  });

  await fastify.register(cors, {
    origin: deps.corsOrigin ?? true,
  });

  await fastify.register(rateLimitPlugin, { limiters: deps.limiters });

  registerErrorHandler(fastify);

  // ==========================================================================
  // Lifecycle Hooks
  // ==========================================================================

  fastify.addHook("onResponse", async (request, reply) => {
    request.log.info(
      {
        url: request.url,
        method: request.method,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      "Request completed"
    );
  });

  // ==========================================================================
  // Routes
  // ==========================================================================

  await fastify.register(healthRoutes, { checks: deps.health });
  await fastify.register(adminRoutes, {
    reconciler: deps.reconciler,
    clicks: deps.clicks,
    limiters: deps.limiters,
  });
  await fastify.register(linksRoutes, { links: deps.links });

  return fastify;
}
