/**
 * Test harness: the full service graph over the in-process stores.
 */

import type { FastifyInstance } from "fastify";
import { createSilentLogger } from "@shortkit/logger";
import { MemoryFastStore, UrlCache } from "@shortkit/cache";
import { MemoryUrlRepository } from "@shortkit/db";
import { ClickAggregator, ClickReconciler } from "@shortkit/analytics";
import { buildApp } from "../src/app.js";
import { LinkService } from "../src/services/links.js";
import { SlidingWindowRateLimiter } from "../src/services/rate-limiter.js";
import type { RateLimitRule, RateLimitScope } from "../src/types.js";

export const BASE_URL = "http://short.test";
export const START = new Date("2026-01-01T00:00:00.000Z");

export interface Harness {
  store: MemoryFastStore;
  repository: MemoryUrlRepository;
  cache: UrlCache;
  clicks: ClickAggregator;
  reconciler: ClickReconciler;
  links: LinkService;
  limiters: Record<RateLimitScope, SlidingWindowRateLimiter>;
  /** Move the shared clock forward */
  advance(ms: number): void;
}

export interface HarnessOptions {
  rateLimits?: Partial<Record<RateLimitScope, RateLimitRule>>;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const logger = createSilentLogger();
  let clock = START.getTime();
  const now = () => clock;

  const store = new MemoryFastStore({ now });
  const repository = new MemoryUrlRepository({ now: () => new Date(clock) });
  const cache = new UrlCache(store, { logger, random: () => 0.5 });
  const clicks = new ClickAggregator(store, { logger });
  const reconciler = new ClickReconciler(clicks, repository, { logger, now, intervalMs: 60_000 });
  const links = new LinkService({
    repository,
    cache,
    clicks,
    baseUrl: BASE_URL,
    logger,
    now: () => new Date(clock),
  });

  const rule = (scope: RateLimitScope): RateLimitRule =>
    options.rateLimits?.[scope] ?? { requests: 1000, windowMs: 60_000 };
  const limiters = {
    default: new SlidingWindowRateLimiter(store, rule("default"), { scope: "default", logger, now }),
    create: new SlidingWindowRateLimiter(store, rule("create"), { scope: "create", logger, now }),
  };

  return {
    store,
    repository,
    cache,
    clicks,
    reconciler,
    links,
    limiters,
    advance(ms: number) {
      clock += ms;
    },
  };
}

export async function createTestApp(harness: Harness): Promise<FastifyInstance> {
  const app = await buildApp({
    links: harness.links,
    clicks: harness.clicks,
    reconciler: harness.reconciler,
    limiters: harness.limiters,
    health: {
      database: () => harness.repository.ping(),
      cache: () => harness.store.ping(),
    },
  });
  await app.ready();
  return app;
}
