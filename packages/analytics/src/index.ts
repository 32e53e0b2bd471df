/**
 * @shortkit/analytics - Click Counting
 *
 * Click aggregation in the fast store and periodic reconciliation into the
 * durable store.
 *
 * Usage:
 * ```ts
 * import { ClickAggregator, ClickReconciler } from "@shortkit/analytics";
 *
 * const clicks = new ClickAggregator(fastStore);
 * const reconciler = new ClickReconciler(clicks, urlRepository);
 * reconciler.start();
 *
 * // on shutdown
 * await reconciler.stop();
 * ```
 */

export { ClickAggregator, clickKey, type ClickAggregatorOptions } from "./aggregator.js";
export { ClickReconciler, type ClickReconcilerOptions } from "./reconciler.js";
export type { ReconcileRunResult, ReconcilerState, AggregatorStats } from "./types.js";
