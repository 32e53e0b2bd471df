/**
 * URL Snapshot Cache
 *
 * Cache-aside storage of URL records in the fast store.
 *
 *   key:   sk:v1:url:{shortCode}
 *   value: CachedUrlSnapshot (JSON)
 *   TTL:   min(ceiling ±8% jitter, seconds until the record expires)
 *
 * Reads and writes return Outcomes and never throw. A payload that fails
 * schema validation (for instance one written by an older release) is
 * reported as a miss and evicted.
 */

import { z } from "zod";
import { createLogger, type Logger } from "@shortkit/logger";
import {
  CACHE_KEYS,
  CACHE_TTL,
  secondsUntilExpiry,
  type CachedUrlSnapshot,
  type UrlRecord,
} from "@shortkit/shared";
import { attempt, ok, type Outcome } from "./outcome.js";
import type { FastStore } from "./types.js";

// =============================================================================
// Snapshot Codec
// =============================================================================

const snapshotSchema = z.object({
  id: z.string().regex(/^\d+$/),
  shortCode: z.string().min(1),
  contentHash: z.string(),
  destinationUrl: z.string(),
  clickCount: z.number().int().nonnegative(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  expiresAt: z.string().datetime().nullable(),
  active: z.boolean(),
  cachedAt: z.number(),
});

export function toSnapshot(record: UrlRecord, cachedAt: number): CachedUrlSnapshot {
  return {
    id: record.id.toString(),
    shortCode: record.shortCode,
    contentHash: record.contentHash,
    destinationUrl: record.destinationUrl,
    clickCount: record.clickCount,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
    expiresAt: record.expiresAt ? record.expiresAt.toISOString() : null,
    active: record.active,
    cachedAt,
  };
}

export function fromSnapshot(snapshot: CachedUrlSnapshot): UrlRecord {
  return {
    id: BigInt(snapshot.id),
    shortCode: snapshot.shortCode,
    contentHash: snapshot.contentHash,
    destinationUrl: snapshot.destinationUrl,
    clickCount: snapshot.clickCount,
    createdAt: new Date(snapshot.createdAt),
    updatedAt: new Date(snapshot.updatedAt),
    expiresAt: snapshot.expiresAt === null ? null : new Date(snapshot.expiresAt),
    active: snapshot.active,
  };
}

/**
 * Decode a raw payload; null when it is not a valid snapshot.
 */
export function parseSnapshot(raw: string): CachedUrlSnapshot | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = snapshotSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// =============================================================================
// TTL
// =============================================================================

/**
 * Apply jitter to a TTL: base * (1 + random(-p, +p)), at least 1 second.
 *
 * Example: 3600s → 3312s to 3888s
 */
export function applyJitter(
  baseTtl: number,
  random: () => number = Math.random,
  percent: number = CACHE_TTL.JITTER_PERCENT
): number {
  const multiplier = 1 + (random() * 2 - 1) * percent;
  return Math.max(1, Math.floor(baseTtl * multiplier));
}

/**
 * TTL for a snapshot of `record`, or null when it must not be cached
 * (already expired, or expiring within the second).
 */
export function snapshotTtl(
  record: UrlRecord,
  ceilingSeconds: number,
  now: Date,
  random: () => number = Math.random
): number | null {
  const remaining = secondsUntilExpiry(record, now);
  if (remaining !== null && remaining <= 0) return null;

  const ceiling = applyJitter(ceilingSeconds, random);
  return remaining === null ? ceiling : Math.min(ceiling, remaining);
}

// =============================================================================
// Cache
// =============================================================================

export interface UrlCacheOptions {
  /** TTL ceiling in seconds (default: 3600) */
  ttlSeconds?: number;
  /** Per-call deadline in ms (default: none, rely on the client's command timeout) */
  timeoutMs?: number;
  logger?: Logger;
  /** Random source for jitter (tests) */
  random?: () => number;
}

export function urlKey(shortCode: string): string {
  return CACHE_KEYS.URL_PREFIX + shortCode;
}

export class UrlCache {
  private readonly store: FastStore;
  private readonly ttlSeconds: number;
  private readonly timeoutMs?: number;
  private readonly log: Logger;
  private readonly random: () => number;

  constructor(store: FastStore, options: UrlCacheOptions = {}) {
    this.store = store;
    this.ttlSeconds = options.ttlSeconds ?? CACHE_TTL.URL_SECONDS;
    this.timeoutMs = options.timeoutMs;
    this.log = options.logger ?? createLogger("url-cache");
    this.random = options.random ?? Math.random;
  }

  /**
   * Look up a cached record. `value: null` is a clean miss.
   */
  async get(shortCode: string): Promise<Outcome<UrlRecord | null>> {
    const key = urlKey(shortCode);
    const result = await attempt("get", () => this.store.get(key), this.timeoutMs);
    if (result.degraded) {
      this.log.warn({ shortCode, err: result.error.message }, "Snapshot read degraded");
      return result;
    }
    if (result.value === null) return ok(null);

    const snapshot = parseSnapshot(result.value);
    if (!snapshot) {
      this.log.warn({ shortCode }, "Discarding malformed snapshot");
      await this.evict(shortCode);
      return ok(null);
    }
    return ok(fromSnapshot(snapshot));
  }

  /**
   * Write a snapshot. Resolves to false when the record was not cached
   * because it is already past its expiry.
   */
  async put(record: UrlRecord, now: Date = new Date()): Promise<Outcome<boolean>> {
    const ttl = snapshotTtl(record, this.ttlSeconds, now, this.random);
    if (ttl === null) return ok(false);

    const payload = JSON.stringify(toSnapshot(record, now.getTime()));
    const result = await attempt(
      "setWithTTL",
      () => this.store.setWithTTL(urlKey(record.shortCode), payload, ttl),
      this.timeoutMs
    );
    if (result.degraded) {
      this.log.warn({ shortCode: record.shortCode, err: result.error.message }, "Snapshot write degraded");
      return result;
    }
    return ok(true);
  }

  async evict(shortCode: string): Promise<Outcome<void>> {
    const result = await attempt("delete", () => this.store.delete(urlKey(shortCode)), this.timeoutMs);
    if (result.degraded) {
      this.log.warn({ shortCode, err: result.error.message }, "Snapshot eviction degraded");
    }
    return result;
  }
}
