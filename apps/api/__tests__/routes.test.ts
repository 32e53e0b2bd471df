/**
 * HTTP Route Tests
 *
 * The full app over the in-process stores, driven with `inject`.
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import type { FastifyInstance } from "fastify";
import { createHarness, createTestApp, type Harness, type HarnessOptions } from "./harness.js";

describe("API routes", () => {
  let h: Harness;
  let app: FastifyInstance;

  async function setup(options: HarnessOptions = {}): Promise<void> {
    h = createHarness(options);
    app = await createTestApp(h);
  }

  function shorten(payload: Record<string, unknown>) {
    return app.inject({ method: "POST", url: "/api/v1/shorten", payload });
  }

  beforeEach(async () => {
    await setup();
  });

  afterEach(async () => {
    await app.close();
    await h.links.settle();
    await h.reconciler.stop();
  });

  // ==========================================================================
  // POST /api/v1/shorten
  // ==========================================================================

  describe("POST /api/v1/shorten", () => {
    it("should create a short URL", async () => {
      const response = await shorten({ url: "https://example.com/docs" });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({
        short_code: "000001",
        short_url: "http://short.test/000001",
        original_url: "https://example.com/docs",
      });
    });

    it("should include the expiry when one is given", async () => {
      const response = await shorten({ url: "https://example.com/docs", expires_in: "2h" });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toMatchObject({ expires_at: "2026-01-01T02:00:00.000Z" });
    });

    it("should return the same code for a repeated destination", async () => {
      await shorten({ url: "https://example.com/docs" });
      const response = await shorten({ url: "https://example.com/docs" });

      expect(response.json()).toMatchObject({ short_code: "000001" });
    });

    it("should require a URL", async () => {
      const response = await shorten({});

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: "invalid_request",
        message: "Validation failed",
        details: { url: ["URL is required"] },
      });
    });

    it("should reject non-http destinations", async () => {
      const response = await shorten({ url: "ftp://example.com/file" });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: "invalid_request",
        message: "Only http/https URLs are allowed",
        details: { url: ["Only http/https URLs are allowed"] },
      });
    });

    it("should reject an expiry too large to represent", async () => {
      const response = await shorten({ url: "https://example.com/x", expires_in: "999999999999d" });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: "invalid_request",
        message: 'Duration out of range: "999999999999d"',
        details: { expires_in: ['Duration out of range: "999999999999d"'] },
      });
      expect(h.repository.all()).toHaveLength(0);
    });

    it("should reject malformed JSON", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/shorten",
        headers: { "content-type": "application/json" },
        payload: "{",
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: "invalid_request" });
    });

    it("should hide durable store failures behind a 500", async () => {
      h.repository.failNext("findByHash");

      const response = await shorten({ url: "https://example.com/docs" });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({ error: "internal_error", message: "Internal server error" });
    });

    it("should set rate limit headers", async () => {
      const response = await shorten({ url: "https://example.com/docs" });

      expect(response.headers["x-ratelimit-limit"]).toBe("1000");
      expect(response.headers["x-ratelimit-remaining"]).toBe("999");
      expect(response.headers["x-ratelimit-reset"]).toBe("1767225660");
    });
  });

  // ==========================================================================
  // GET /:code
  // ==========================================================================

  describe("GET /:code", () => {
    beforeEach(async () => {
      await shorten({ url: "https://example.com/target" });
    });

    it("should redirect to the destination", async () => {
      const response = await app.inject({ method: "GET", url: "/000001" });

      expect(response.statusCode).toBe(301);
      expect(response.headers.location).toBe("https://example.com/target");
    });

    it("should return 404 for unknown codes", async () => {
      const response = await app.inject({ method: "GET", url: "/zzzzzz" });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: "not_found", message: "Short URL not found" });
    });

    it("should return 410 for deactivated links", async () => {
      await h.links.settle();
      await h.cache.evict("000001");
      h.repository.update(1n, { active: false });

      const response = await app.inject({ method: "GET", url: "/000001" });

      expect(response.statusCode).toBe(410);
      expect(response.json()).toEqual({ error: "expired", message: "This short URL has expired" });
    });

    it("should keep redirecting while the fast store is down", async () => {
      h.store.setAvailable(false);

      const response = await app.inject({ method: "GET", url: "/000001" });

      expect(response.statusCode).toBe(301);
    });
  });

  // ==========================================================================
  // GET /api/v1/stats/:code
  // ==========================================================================

  describe("GET /api/v1/stats/:code", () => {
    it("should report clicks", async () => {
      await shorten({ url: "https://example.com/target" });
      await app.inject({ method: "GET", url: "/000001" });
      await app.inject({ method: "GET", url: "/000001" });
      await h.links.settle();

      const response = await app.inject({ method: "GET", url: "/api/v1/stats/000001" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        short_code: "000001",
        original_url: "https://example.com/target",
        click_count: 2,
        created_at: "2026-01-01T00:00:00.000Z",
        is_active: true,
      });
    });

    it("should return 404 for unknown codes", async () => {
      const response = await app.inject({ method: "GET", url: "/api/v1/stats/000009" });

      expect(response.statusCode).toBe(404);
    });
  });

  // ==========================================================================
  // Rate limiting
  // ==========================================================================

  describe("rate limiting", () => {
    beforeEach(async () => {
      await app.close();
      await setup({ rateLimits: { create: { requests: 2, windowMs: 60_000 } } });
    });

    it("should reject requests over the limit", async () => {
      await shorten({ url: "https://example.com/a" });
      await shorten({ url: "https://example.com/b" });
      const response = await shorten({ url: "https://example.com/c" });

      expect(response.statusCode).toBe(429);
      expect(response.headers["retry-after"]).toBe("60");
      expect(response.headers["x-ratelimit-remaining"]).toBe("0");
      expect(response.json()).toEqual({
        error: "rate_limited",
        message: "Too many requests. Limit is 2 per 60s.",
      });
      expect(h.repository.all()).toHaveLength(2);
    });

    it("should limit scopes independently", async () => {
      await shorten({ url: "https://example.com/a" });
      await shorten({ url: "https://example.com/b" });

      const response = await app.inject({ method: "GET", url: "/000001" });

      expect(response.statusCode).toBe(301);
    });

    it("should admit again once the window has passed", async () => {
      await shorten({ url: "https://example.com/a" });
      await shorten({ url: "https://example.com/b" });
      h.advance(60_001);

      const response = await shorten({ url: "https://example.com/c" });

      expect(response.statusCode).toBe(201);
    });

    it("should fail open when the fast store is down", async () => {
      h.store.setAvailable(false);

      const responses = [
        await shorten({ url: "https://example.com/a" }),
        await shorten({ url: "https://example.com/b" }),
        await shorten({ url: "https://example.com/c" }),
      ];

      expect(responses.map((r) => r.statusCode)).toEqual([201, 201, 201]);
    });
  });

  // ==========================================================================
  // Client identity
  // ==========================================================================

  describe("client identity", () => {
    beforeEach(async () => {
      await app.close();
      await setup({ rateLimits: { create: { requests: 1, windowMs: 60_000 } } });
    });

    function shortenFrom(remoteAddress: string, forwardedFor: string, url: string) {
      return app.inject({
        method: "POST",
        url: "/api/v1/shorten",
        remoteAddress,
        headers: { "x-forwarded-for": forwardedFor },
        payload: { url },
      });
    }

    it("should ignore X-Forwarded-For from untrusted addresses", async () => {
      const responses = [
        await shortenFrom("203.0.113.9", "198.51.100.1", "https://example.com/a"),
        await shortenFrom("203.0.113.9", "198.51.100.2", "https://example.com/b"),
        await shortenFrom("203.0.113.9", "198.51.100.3", "https://example.com/c"),
      ];

      expect(responses.map((r) => r.statusCode)).toEqual([201, 429, 429]);
    });

    it("should use X-Forwarded-For from a trusted proxy", async () => {
      const responses = [
        await shortenFrom("10.0.0.5", "198.51.100.1", "https://example.com/a"),
        await shortenFrom("10.0.0.5", "198.51.100.2", "https://example.com/b"),
        await shortenFrom("10.0.0.5", "198.51.100.1", "https://example.com/c"),
      ];

      expect(responses.map((r) => r.statusCode)).toEqual([201, 201, 429]);
    });
  });

  // ==========================================================================
  // Health
  // ==========================================================================

  describe("health", () => {
    it("should report liveness", async () => {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok" });
    });

    it("should report readiness when both stores answer", async () => {
      const response = await app.inject({ method: "GET", url: "/health/ready" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok", checks: { database: "ok", cache: "ok" } });
    });

    it("should report degraded readiness when the fast store is down", async () => {
      h.store.setAvailable(false);

      const response = await app.inject({ method: "GET", url: "/health/ready" });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: "degraded", checks: { database: "ok", cache: "error" } });
    });
  });

  // ==========================================================================
  // Admin
  // ==========================================================================

  describe("admin", () => {
    it("should run reconciliation on demand", async () => {
      await shorten({ url: "https://example.com/target" });
      await app.inject({ method: "GET", url: "/000001" });
      await h.links.settle();

      const response = await app.inject({ method: "POST", url: "/api/v1/admin/sync" });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toMatchObject({ keysScanned: 1, applied: 1, clicksApplied: 1, timedOut: false });
      expect(h.repository.all()[0].clickCount).toBe(1);
    });

    it("should refuse once the reconciler is stopped", async () => {
      await h.reconciler.stop();

      const response = await app.inject({ method: "POST", url: "/api/v1/admin/sync" });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toEqual({ error: "conflict", message: "Click reconciler is stopped" });
    });

    it("should expose Prometheus metrics", async () => {
      await shorten({ url: "https://example.com/target" });
      await app.inject({ method: "GET", url: "/000001" });
      await h.links.settle();

      const response = await app.inject({ method: "GET", url: "/metrics" });
      const lines = response.body.split("\n");

      expect(response.statusCode).toBe(200);
      expect(response.headers["content-type"]).toMatch(/^text\/plain/);
      expect(lines).toContain("# TYPE shortkit_click_increments_total counter");
      expect(lines).toContain("shortkit_click_increments_total 1");
      expect(lines).toContain('shortkit_rate_limit_checks_total{scope="default"} 1');
      expect(lines).toContain('shortkit_rate_limit_checks_total{scope="create"} 1');
      expect(lines).toContain('shortkit_rate_limit_rejected_total{scope="create"} 0');
    });
  });

  it("should return 404 for unknown routes", async () => {
    const response = await app.inject({ method: "GET", url: "/api/v1/nothing/here" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "not_found", message: "Route GET /api/v1/nothing/here not found" });
  });
});
