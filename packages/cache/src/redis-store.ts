/**
 * Redis Fast Store
 *
 * FastStore over ioredis. Counters use INCRBY and GETDEL so that every
 * mutation is a single atomic command; the sliding window uses two
 * pipelines (prune + count, add + expire).
 */

import type Redis from "ioredis";
import { CLICK_SYNC } from "@shortkit/shared";
import { createRedisClient, type RedisClientOptions } from "./client.js";
import { MalformedCounterError, type FastStore } from "./types.js";

// =============================================================================
// Types
// =============================================================================

type PipelineResult = [error: Error | null, result: unknown][] | null;

/**
 * Pipeline interface (minimal subset we need)
 */
export interface RedisPipeline {
  zremrangebyscore(key: string, min: number | string, max: number | string): RedisPipeline;
  zcard(key: string): RedisPipeline;
  zadd(key: string, score: number | string, member: string): RedisPipeline;
  pexpire(key: string, milliseconds: number): RedisPipeline;
  exec(): Promise<PipelineResult>;
}

/**
 * Redis client interface (minimal subset we need)
 * Allows easy mocking in tests
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<string>;
  del(key: string): Promise<number>;
  incrby(key: string, increment: number): Promise<number>;
  getdel(key: string): Promise<string | null>;
  scan(
    cursor: string,
    matchToken: "MATCH",
    pattern: string,
    countToken: "COUNT",
    count: number
  ): Promise<[cursor: string, keys: string[]]>;
  pipeline(): RedisPipeline;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

export interface RedisFastStoreOptions {
  /** SCAN page size hint (default: 100) */
  scanCount?: number;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Escape glob metacharacters so a prefix matches literally in SCAN MATCH.
 */
function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, "\\$&");
}

function parseCounter(key: string, raw: string | null): number {
  if (raw === null) return 0;
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedCounterError(key, raw);
  }
  return value;
}

/**
 * Unwrap pipeline results, rethrowing the first command error.
 */
function unwrapPipeline(results: PipelineResult): unknown[] {
  if (results === null) {
    throw new Error("Pipeline aborted");
  }
  return results.map(([err, value]) => {
    if (err) throw err;
    return value;
  });
}

// =============================================================================
// Store
// =============================================================================

export class RedisFastStore implements FastStore {
  private readonly client: RedisClient;
  private readonly scanCount: number;

  constructor(client: RedisClient, options: RedisFastStoreOptions = {}) {
    this.client = client;
    this.scanCount = options.scanCount ?? CLICK_SYNC.SCAN_COUNT;
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.setex(key, Math.max(1, Math.floor(ttlSeconds)), value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incrBy(key: string, amount: number): Promise<number> {
    return this.client.incrby(key, amount);
  }

  async getAndClear(key: string): Promise<number> {
    return parseCounter(key, await this.client.getdel(key));
  }

  async scanKeysByPrefix(prefix: string): Promise<string[]> {
    const pattern = `${escapeGlob(prefix)}*`;
    // SCAN may return a key more than once across pages
    const keys = new Set<string>();
    let cursor = "0";

    do {
      const [next, page] = await this.client.scan(cursor, "MATCH", pattern, "COUNT", this.scanCount);
      for (const key of page) keys.add(key);
      cursor = next;
    } while (cursor !== "0");

    return [...keys];
  }

  async pruneAndCount(key: string, minScore: number): Promise<number> {
    const results = unwrapPipeline(
      await this.client.pipeline().zremrangebyscore(key, "-inf", `(${minScore}`).zcard(key).exec()
    );
    const count = results[1];
    if (typeof count !== "number") {
      throw new Error(`Unexpected ZCARD reply for ${key}`);
    }
    return count;
  }

  async recordHit(key: string, score: number, member: string, ttlMs: number): Promise<void> {
    unwrapPipeline(
      await this.client.pipeline().zadd(key, score, member).pexpire(key, Math.max(1, Math.ceil(ttlMs))).exec()
    );
  }

  async ping(): Promise<boolean> {
    return (await this.client.ping()) === "PONG";
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Create a RedisFastStore from configuration.
 * Returns the underlying client too, for event wiring and shutdown.
 */
export function createRedisFastStore(
  options: RedisClientOptions & RedisFastStoreOptions
): { store: RedisFastStore; client: Redis } {
  const client = createRedisClient(options);
  return { store: new RedisFastStore(client, options), client };
}
