/**
 * Click Reconciler
 *
 * Background task that moves pending click counters into the durable store.
 *
 * Per counter:
 *   1. drain (GETDEL)              zero → skipped; malformed value → lost
 *   2. addClicks(code, n)          ok   → applied
 *   3a. apply threw                restore(code, n); restore threw → lost
 *   3b. no row matched             orphaned counter → lost (not restored)
 *
 * Lifecycle:
 *
 *   idle ──run──▶ running ──done──▶ idle
 *     │                               │
 *     └──────────── stop() ───────────┴──▶ stopped (terminal)
 *
 * Runs are single-flight: a trigger while a run is in flight joins it.
 * `stop()` cancels the timer, waits for the in-flight run, then performs
 * one final run so counters accumulated before shutdown are flushed.
 */

import { createLogger, type Logger } from "@shortkit/logger";
import { CLICK_SYNC } from "@shortkit/shared";
import { MalformedCounterError } from "@shortkit/cache";
import type { UrlRepository } from "@shortkit/db";
import type { ClickAggregator } from "./aggregator.js";
import type { ReconcileRunResult, ReconcilerState } from "./types.js";

export interface ClickReconcilerOptions {
  /** Time between scheduled runs in ms (default: 1 hour) */
  intervalMs?: number;
  /** Deadline for one run in ms (default: 5 minutes) */
  runTimeoutMs?: number;
  logger?: Logger;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
}

type ClickSink = Pick<UrlRepository, "addClicks">;

function emptyResult(): ReconcileRunResult {
  return {
    keysScanned: 0,
    applied: 0,
    skipped: 0,
    failed: 0,
    restored: 0,
    lost: 0,
    clicksApplied: 0,
    timedOut: false,
    durationMs: 0,
  };
}

export class ClickReconciler {
  private readonly aggregator: ClickAggregator;
  private readonly sink: ClickSink;
  private readonly intervalMs: number;
  private readonly runTimeoutMs: number;
  private readonly log: Logger;
  private readonly now: () => number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<ReconcileRunResult> | null = null;
  private stopping: Promise<ReconcileRunResult> | null = null;
  private stopped = false;

  constructor(aggregator: ClickAggregator, sink: ClickSink, options: ClickReconcilerOptions = {}) {
    this.aggregator = aggregator;
    this.sink = sink;
    this.intervalMs = options.intervalMs ?? CLICK_SYNC.INTERVAL_MS;
    this.runTimeoutMs = options.runTimeoutMs ?? CLICK_SYNC.RUN_TIMEOUT_MS;
    this.log = options.logger ?? createLogger("click-reconciler");
    this.now = options.now ?? Date.now;
  }

  get state(): ReconcilerState {
    if (this.stopped) return "stopped";
    return this.inFlight ? "running" : "idle";
  }

  get isScheduled(): boolean {
    return this.timer !== null;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Schedule periodic runs. Idempotent while started.
   *
   * @throws Error once the reconciler has been stopped
   */
  start(): void {
    if (this.stopped || this.stopping) {
      throw new Error("Click reconciler has been stopped");
    }
    if (this.timer) {
      this.log.warn("Click reconciler already running");
      return;
    }

    this.timer = setInterval(() => {
      this.runNow().catch((err: unknown) => {
        this.log.error({ err }, "Scheduled reconciliation failed");
      });
    }, this.intervalMs);

    this.log.info({ intervalMs: this.intervalMs }, "Click reconciler started");
  }

  /**
   * Trigger a run now, or join the one in flight.
   * Resolves to null once stop() has been called.
   */
  async runNow(): Promise<ReconcileRunResult | null> {
    if (this.stopped || this.stopping) return null;
    return this.runOnce();
  }

  /**
   * Stop scheduling, wait for any in-flight run, then perform a final run.
   * Resolves with the final run's result; repeated calls share it.
   */
  async stop(): Promise<ReconcileRunResult> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<ReconcileRunResult> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    this.log.info("Running final reconciliation before shutdown");
    const result = await this.runOnce();
    this.stopped = true;
    this.log.info("Click reconciler stopped");
    return result;
  }

  private runOnce(): Promise<ReconcileRunResult> {
    if (!this.inFlight) {
      this.inFlight = this.execute().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  // ===========================================================================
  // Run
  // ===========================================================================

  /**
   * One pass over every tracked counter. Never rejects.
   */
  private async execute(): Promise<ReconcileRunResult> {
    const startedAt = this.now();
    const deadline = startedAt + this.runTimeoutMs;
    const result = emptyResult();

    let codes: string[];
    try {
      codes = await this.aggregator.trackedCodes();
    } catch (err) {
      this.log.error({ err }, "Reconciliation aborted: counter scan failed");
      result.durationMs = this.now() - startedAt;
      return result;
    }
    result.keysScanned = codes.length;

    for (const code of codes) {
      if (this.now() >= deadline) {
        result.timedOut = true;
        break;
      }
      await this.reconcileCode(code, result);
    }

    result.durationMs = this.now() - startedAt;

    const summary = { ...result };
    if (result.timedOut) {
      this.log.warn(summary, "Reconciliation run hit its deadline; remaining counters left for next run");
    } else if (result.lost > 0) {
      this.log.error(summary, "Reconciliation run completed with data loss");
    } else {
      this.log.info(summary, "Reconciliation run completed");
    }

    return result;
  }

  private async reconcileCode(shortCode: string, result: ReconcileRunResult): Promise<void> {
    let count: number;
    try {
      count = await this.aggregator.drainAndReset(shortCode);
    } catch (err) {
      result.failed++;
      if (err instanceof MalformedCounterError) {
        result.lost++;
        this.log.error({ shortCode, raw: err.raw }, "Data loss: drained click counter was not an integer");
        return;
      }
      this.log.warn({ err, shortCode }, "Failed to drain click counter");
      return;
    }

    if (count === 0) {
      result.skipped++;
      return;
    }

    let affected: number;
    try {
      affected = await this.sink.addClicks(shortCode, count);
    } catch (err) {
      result.failed++;
      await this.restore(shortCode, count, err, result);
      return;
    }

    if (affected === 0) {
      result.failed++;
      result.lost++;
      this.log.error({ shortCode, clicks: count }, "Data loss: click counter has no matching url");
      return;
    }

    result.applied++;
    result.clicksApplied += count;
  }

  private async restore(
    shortCode: string,
    count: number,
    applyError: unknown,
    result: ReconcileRunResult
  ): Promise<void> {
    try {
      await this.aggregator.restore(shortCode, count);
      result.restored++;
      this.log.warn({ err: applyError, shortCode, clicks: count }, "Click apply failed; counter restored");
    } catch (err) {
      result.lost++;
      this.log.error(
        { err, applyError, shortCode, clicks: count },
        "Data loss: click apply failed and counter could not be restored"
      );
    }
  }
}
