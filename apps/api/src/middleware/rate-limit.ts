/**
 * Rate Limit Middleware
 *
 * Decorates the instance with `rateLimit(scope)`, which returns a preHandler
 * that consults the scope's sliding-window limiter.
 *
 * Usage:
 * ```ts
 * fastify.get("/:code", { preHandler: fastify.rateLimit("default") }, handler);
 * ```
 *
 * Headers on every limited route:
 *   X-RateLimit-Limit, X-RateLimit-Remaining, X-RateLimit-Reset (unix seconds)
 * and on rejection also Retry-After.
 */

import type { FastifyPluginAsync, FastifyReply, preHandlerHookHandler } from "fastify";
import fp from "fastify-plugin";
import type { SlidingWindowRateLimiter } from "../services/rate-limiter.js";
import type { RateLimitDecision, RateLimitScope } from "../types.js";

// ============================================================================
// Type Augmentation
// ============================================================================

declare module "fastify" {
  interface FastifyInstance {
    /** preHandler enforcing the named limiter */
    rateLimit(scope: RateLimitScope): preHandlerHookHandler;
  }

  interface FastifyRequest {
    /** Decision of the limiter that admitted this request */
    rateLimit?: RateLimitDecision;
  }
}

export interface RateLimitPluginOptions {
  limiters: Record<RateLimitScope, SlidingWindowRateLimiter>;
}

// ============================================================================
// Helpers
// ============================================================================

function setRateLimitHeaders(reply: FastifyReply, decision: RateLimitDecision): void {
  reply.header("X-RateLimit-Limit", String(decision.limit));
  reply.header("X-RateLimit-Remaining", String(decision.remaining));
  reply.header("X-RateLimit-Reset", String(Math.floor(decision.resetAt.getTime() / 1000)));
}

// ============================================================================
// Plugin
// ============================================================================

const rateLimitPluginAsync: FastifyPluginAsync<RateLimitPluginOptions> = async (fastify, opts) => {
  fastify.decorateRequest("rateLimit", undefined);

  fastify.decorate("rateLimit", (scope: RateLimitScope): preHandlerHookHandler => {
    const limiter = opts.limiters[scope];

    return async (request, reply) => {
      const decision = await limiter.check(request.ip);
      setRateLimitHeaders(reply, decision);

      if (!decision.allowed) {
        request.log.info({ ip: request.ip, scope }, "Rate limit exceeded");
        reply.header("Retry-After", String(decision.retryAfterSeconds));
        return reply.status(429).send({
          error: "rate_limited",
          message: `Too many requests. Limit is ${decision.limit} per ${decision.retryAfterSeconds}s.`,
        });
      }

      request.rateLimit = decision;
    };
  });
};

export const rateLimitPlugin = fp(rateLimitPluginAsync, {
  name: "rate-limit",
  fastify: "4.x",
});
