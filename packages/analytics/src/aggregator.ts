/**
 * Click Aggregator
 *
 * Accumulates clicks per short code in the fast store so that the resolve
 * path never writes to the durable store:
 *
 *   resolve ──INCRBY──▶ sk:v1:clicks:{code} ──GETDEL──▶ reconciler ──▶ urls.click_count
 *
 * `increment` is fire-and-forget: bounded by a short deadline and never
 * rejects. The drain side (`drainAndReset`, `restore`, `trackedCodes`)
 * rejects on failure so the reconciler can decide what to do.
 */

import { createLogger, type Logger } from "@shortkit/logger";
import { CACHE_KEYS, CLICK_SYNC } from "@shortkit/shared";
import { attempt, type FastStore, type Outcome } from "@shortkit/cache";
import type { AggregatorStats } from "./types.js";

export interface ClickAggregatorOptions {
  /** Deadline for one increment in ms (default: 200) */
  incrementTimeoutMs?: number;
  logger?: Logger;
}

export function clickKey(shortCode: string): string {
  return CACHE_KEYS.CLICKS_PREFIX + shortCode;
}

export class ClickAggregator {
  private readonly store: FastStore;
  private readonly incrementTimeoutMs: number;
  private readonly log: Logger;
  private readonly stats: AggregatorStats = { increments: 0, dropped: 0 };

  constructor(store: FastStore, options: ClickAggregatorOptions = {}) {
    this.store = store;
    this.incrementTimeoutMs = options.incrementTimeoutMs ?? CLICK_SYNC.INCREMENT_TIMEOUT_MS;
    this.log = options.logger ?? createLogger("click-aggregator");
  }

  /**
   * Count one click. Failures and timeouts are logged and dropped.
   */
  async increment(shortCode: string): Promise<void> {
    const result = await attempt(
      "incrBy",
      () => this.store.incrBy(clickKey(shortCode), 1),
      this.incrementTimeoutMs
    );

    if (result.degraded) {
      this.stats.dropped++;
      this.log.warn({ shortCode, err: result.error.message }, "Click increment dropped");
      return;
    }
    this.stats.increments++;
  }

  /**
   * Atomically read and delete the pending count. Missing counter reads 0.
   */
  async drainAndReset(shortCode: string): Promise<number> {
    return this.store.getAndClear(clickKey(shortCode));
  }

  /**
   * Put drained clicks back after a failed apply. Adds to whatever
   * accumulated since the drain.
   */
  async restore(shortCode: string, count: number): Promise<void> {
    if (count <= 0) return;
    await this.store.incrBy(clickKey(shortCode), count);
  }

  /**
   * Pending clicks without clearing them.
   */
  async pending(shortCode: string): Promise<Outcome<number>> {
    const result = await attempt("get", () => this.store.get(clickKey(shortCode)));
    if (result.degraded) return result;

    const value = result.value === null ? 0 : Number(result.value);
    if (!Number.isSafeInteger(value) || value < 0) {
      this.log.warn({ shortCode, raw: result.value }, "Ignoring malformed click counter");
      return { degraded: false, value: 0 };
    }
    return { degraded: false, value };
  }

  /**
   * Short codes with a pending counter.
   */
  async trackedCodes(): Promise<string[]> {
    const prefix = CACHE_KEYS.CLICKS_PREFIX;
    const keys = await this.store.scanKeysByPrefix(prefix);
    return keys.map((key) => key.slice(prefix.length));
  }

  getStats(): AggregatorStats {
    return { ...this.stats };
  }
}
