/**
 * Fast Store Contract
 *
 * The subset of key-value primitives the engine relies on. Implemented by
 * RedisFastStore (production) and MemoryFastStore (tests, local runs).
 *
 * Every method rejects on store failure; callers on the acceleration path
 * wrap calls with `attempt()` to turn failures into degraded outcomes.
 */

export interface FastStore {
  /** Raw value, or null when the key is absent or expired */
  get(key: string): Promise<string | null>;

  /** Set a value that expires after `ttlSeconds` */
  setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void>;

  delete(key: string): Promise<void>;

  /** Atomic add; a missing key counts as 0. Returns the new value. */
  incrBy(key: string, amount: number): Promise<number>;

  /** Atomic read-and-delete of an integer counter; a missing key reads as 0 */
  getAndClear(key: string): Promise<number>;

  /** Every live key starting with `prefix` (full keys, unordered) */
  scanKeysByPrefix(prefix: string): Promise<string[]>;

  /**
   * Remove sorted-set members scored strictly below `minScore`, then
   * return how many remain.
   */
  pruneAndCount(key: string, minScore: number): Promise<number>;

  /** Add a sorted-set member and (re)set the key's expiry */
  recordHit(key: string, score: number, member: string, ttlMs: number): Promise<void>;

  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}

export type FastStoreOperation = Exclude<keyof FastStore, "disconnect">;

/**
 * A drained counter held something other than an integer. Raised after the
 * key was deleted, so its value is gone.
 */
export class MalformedCounterError extends Error {
  readonly key: string;
  readonly raw: string;

  constructor(key: string, raw: string) {
    super(`Counter at ${key} is not an integer: ${raw}`);
    this.name = "MalformedCounterError";
    this.key = key;
    this.raw = raw;
  }
}
