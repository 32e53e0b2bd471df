/**
 * @shortkit/analytics - Type Definitions
 */

// =============================================================================
// Reconciliation
// =============================================================================

export type ReconcilerState = "idle" | "running" | "stopped";

/**
 * Outcome of one reconciliation run.
 *
 * Every scanned counter lands in exactly one of applied / skipped / failed
 * unless the run timed out first. Failed counters are further split into
 * restored (back in the fast store) and lost (logged as data loss).
 */
export interface ReconcileRunResult {
  /** Counters found by the scan */
  keysScanned: number;

  /** Counters whose drained clicks reached the durable store */
  applied: number;

  /** Counters that drained to zero */
  skipped: number;

  /** Counters whose drain or apply failed */
  failed: number;

  /** Failed applies whose clicks were put back */
  restored: number;

  /** Counters whose clicks were dropped: orphaned counters and failed restores */
  lost: number;

  /** Total clicks added to the durable store */
  clicksApplied: number;

  /** True when the run deadline passed before every counter was handled */
  timedOut: boolean;

  durationMs: number;
}

// =============================================================================
// Aggregator
// =============================================================================

export interface AggregatorStats {
  /** Increments acknowledged by the fast store */
  increments: number;

  /** Increments dropped after a failure or timeout */
  dropped: number;
}
