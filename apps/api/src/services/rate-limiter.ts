/**
 * Sliding Window Rate Limiter
 *
 * Counts each caller's requests over a trailing window using a sorted set
 * in the fast store (score = request time in ns):
 *
 *   1. prune members older than now - window, count the rest
 *   2. count >= limit  → reject, nothing recorded
 *   3. otherwise       → record this request, refresh key expiry, admit
 *
 * Fails open: when the store is unavailable the request is admitted and the
 * decision is flagged `degraded`.
 */

import { randomUUID } from "node:crypto";
import { createLogger, type Logger } from "@shortkit/logger";
import { attempt, type FastStore } from "@shortkit/cache";
import { CACHE_KEYS } from "@shortkit/shared";
import type { RateLimitDecision, RateLimitRule } from "../types.js";

const NS_PER_MS = 1_000_000;

export interface RateLimiterOptions {
  /** Key namespace, e.g. "default" or "create" */
  scope: string;
  /** Per-call deadline in ms (default: none, rely on the client's command timeout) */
  timeoutMs?: number;
  logger?: Logger;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
}

export interface RateLimiterStats {
  totalChecks: number;
  rejected: number;
  /** Checks answered without the backing store */
  failOpen: number;
}

export class SlidingWindowRateLimiter {
  readonly rule: RateLimitRule;
  readonly scope: string;

  private readonly store: FastStore;
  private readonly timeoutMs?: number;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly stats: RateLimiterStats = { totalChecks: 0, rejected: 0, failOpen: 0 };

  constructor(store: FastStore, rule: RateLimitRule, options: RateLimiterOptions) {
    this.store = store;
    this.rule = rule;
    this.scope = options.scope;
    this.timeoutMs = options.timeoutMs;
    this.log = options.logger ?? createLogger(`rate-limiter:${options.scope}`);
    this.now = options.now ?? Date.now;
  }

  key(identity: string): string {
    return `${CACHE_KEYS.RATE_LIMIT_PREFIX}${this.scope}:${identity}`;
  }

  /**
   * Decide whether `identity` may make another request. Never rejects.
   */
  async check(identity: string): Promise<RateLimitDecision> {
    this.stats.totalChecks++;

    const { requests: limit, windowMs } = this.rule;
    const nowMs = this.now();
    const nowNs = nowMs * NS_PER_MS;
    const windowStartNs = nowNs - windowMs * NS_PER_MS;
    const resetAt = new Date(nowMs + windowMs);
    const retryAfterSeconds = Math.ceil(windowMs / 1000);
    const key = this.key(identity);

    const counted = await attempt("pruneAndCount", () => this.store.pruneAndCount(key, windowStartNs), this.timeoutMs);
    if (counted.degraded) {
      this.stats.failOpen++;
      this.log.warn({ identity, err: counted.error.message }, "Rate limit store unavailable; failing open");
      return { allowed: true, limit, remaining: limit - 1, resetAt, retryAfterSeconds, degraded: true };
    }

    const count = counted.value;
    if (count >= limit) {
      this.stats.rejected++;
      return { allowed: false, limit, remaining: 0, resetAt, retryAfterSeconds, degraded: false };
    }

    const remaining = Math.max(0, limit - count - 1);
    const member = `${nowNs}-${randomUUID()}`;
    const recorded = await attempt(
      "recordHit",
      () => this.store.recordHit(key, nowNs, member, windowMs),
      this.timeoutMs
    );
    if (recorded.degraded) {
      this.stats.failOpen++;
      this.log.warn({ identity, err: recorded.error.message }, "Failed to record request; admitting anyway");
      return { allowed: true, limit, remaining, resetAt, retryAfterSeconds, degraded: true };
    }

    return { allowed: true, limit, remaining, resetAt, retryAfterSeconds, degraded: false };
  }

  getStats(): RateLimiterStats {
    return { ...this.stats };
  }
}
