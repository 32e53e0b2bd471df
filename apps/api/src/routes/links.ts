/**
 * Link Routes
 *
 * Endpoints:
 *   POST /api/v1/shorten        - Create (or reuse) a short URL
 *   GET  /api/v1/stats/:code    - Click statistics
 *   GET  /:code                 - Redirect to the destination
 */

import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { ValidationError } from "@shortkit/shared";
import type { LinkService } from "../services/links.js";
// fastify.rateLimit decorator types
import "../middleware/rate-limit.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const shortenSchema = z.object({
  url: z.string({ required_error: "URL is required" }).trim().min(1, "URL is required"),
  expires_in: z.string().trim().optional(),
});

const codeParamsSchema = z.object({
  code: z.string(),
});

/**
 * Field-level messages keyed by dotted path ("body" for the root).
 */
function fieldErrors(error: z.ZodError): Record<string, string[]> {
  const details: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const field = issue.path.join(".") || "body";
    (details[field] ??= []).push(issue.message);
  }
  return details;
}

export interface LinkRoutesOptions {
  links: LinkService;
}

// ============================================================================
// Route Registration
// ============================================================================

export const linksRoutes: FastifyPluginAsync<LinkRoutesOptions> = async (
  fastify: FastifyInstance,
  opts: LinkRoutesOptions
) => {
  const { links } = opts;

  fastify.post("/api/v1/shorten", { preHandler: fastify.rateLimit("create") }, async (request, reply) => {
    const parsed = shortenSchema.safeParse(request.body);
    if (!parsed.success) {
      throw new ValidationError("Validation failed", fieldErrors(parsed.error));
    }

    const { url, expires_in } = parsed.data;
    const result = await links.create({ url, expiresIn: expires_in });

    return reply.status(201).send({
      short_code: result.shortCode,
      short_url: result.shortUrl,
      original_url: result.destinationUrl,
      ...(result.expiresAt ? { expires_at: result.expiresAt.toISOString() } : {}),
    });
  });

  fastify.get("/api/v1/stats/:code", { preHandler: fastify.rateLimit("default") }, async (request, reply) => {
    const { code } = codeParamsSchema.parse(request.params);
    const stats = await links.getStats(code);

    return reply.send({
      short_code: stats.shortCode,
      original_url: stats.destinationUrl,
      click_count: stats.totalClicks,
      created_at: stats.createdAt.toISOString(),
      ...(stats.expiresAt ? { expires_at: stats.expiresAt.toISOString() } : {}),
      is_active: stats.active,
    });
  });

  fastify.get("/:code", { preHandler: fastify.rateLimit("default") }, async (request, reply) => {
    const { code } = codeParamsSchema.parse(request.params);
    const destination = await links.resolve(code);

    return reply.redirect(301, destination);
  });
};
