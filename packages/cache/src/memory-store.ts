/**
 * In-Process Fast Store
 *
 * FastStore held in a Map, with per-key expiry against an injectable clock.
 * Used by tests and by local runs without Redis.
 *
 * Each operation completes synchronously inside its promise, so read-then-
 * delete (getAndClear) and prune-then-count are atomic with respect to other
 * callers on the event loop.
 *
 * Fault injection:
 *   store.failNext("incrBy")    next incrBy rejects
 *   store.setAvailable(false)   every operation rejects until re-enabled
 */

import { MalformedCounterError, type FastStore, type FastStoreOperation } from "./types.js";

type Entry =
  | { kind: "string"; value: string; expiresAt: number | null }
  | { kind: "zset"; members: Map<string, number>; expiresAt: number | null };

export interface MemoryFastStoreOptions {
  /** Clock in ms (default: Date.now) */
  now?: () => number;
}

const WRONGTYPE = "WRONGTYPE Operation against a key holding the wrong kind of value";

export class MemoryFastStore implements FastStore {
  private readonly entries = new Map<string, Entry>();
  private readonly now: () => number;
  private readonly pendingFaults: { operation: FastStoreOperation | "*"; error: Error }[] = [];
  private available = true;

  constructor(options: MemoryFastStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  // ===========================================================================
  // Fault Injection
  // ===========================================================================

  /**
   * Make the next call to `operation` (or to any operation, by default) reject.
   */
  failNext(operation: FastStoreOperation | "*" = "*", error = new Error("Injected fast store failure")): void {
    this.pendingFaults.push({ operation, error });
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  private guard(operation: FastStoreOperation): void {
    if (!this.available) {
      throw new Error("Fast store unavailable");
    }
    const index = this.pendingFaults.findIndex((f) => f.operation === operation || f.operation === "*");
    if (index !== -1) {
      const [fault] = this.pendingFaults.splice(index, 1);
      throw fault.error;
    }
  }

  // ===========================================================================
  // Entry Access
  // ===========================================================================

  /** Like Redis, a key stays readable until the clock passes its expiry */
  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt < this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private stringValue(key: string): string | null {
    const entry = this.live(key);
    if (!entry) return null;
    if (entry.kind !== "string") throw new Error(WRONGTYPE);
    return entry.value;
  }

  /** Test helper: remaining ms before `key` expires, null without expiry or key */
  ttlMs(key: string): number | null {
    const entry = this.live(key);
    if (!entry || entry.expiresAt === null) return null;
    return entry.expiresAt - this.now();
  }

  /** Test helper: number of live keys */
  size(): number {
    for (const key of [...this.entries.keys()]) this.live(key);
    return this.entries.size;
  }

  // ===========================================================================
  // FastStore
  // ===========================================================================

  async get(key: string): Promise<string | null> {
    this.guard("get");
    return this.stringValue(key);
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.guard("setWithTTL");
    const seconds = Math.max(1, Math.floor(ttlSeconds));
    this.entries.set(key, { kind: "string", value, expiresAt: this.now() + seconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.guard("delete");
    this.entries.delete(key);
  }

  async incrBy(key: string, amount: number): Promise<number> {
    this.guard("incrBy");
    const raw = this.stringValue(key);
    const current = raw === null ? 0 : Number(raw);
    if (!Number.isSafeInteger(current)) {
      throw new Error("ERR value is not an integer or out of range");
    }

    const next = current + amount;
    const existing = this.live(key);
    this.entries.set(key, {
      kind: "string",
      value: String(next),
      expiresAt: existing ? existing.expiresAt : null,
    });
    return next;
  }

  async getAndClear(key: string): Promise<number> {
    this.guard("getAndClear");
    const raw = this.stringValue(key);
    this.entries.delete(key);
    if (raw === null) return 0;

    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
      throw new MalformedCounterError(key, raw);
    }
    return value;
  }

  async scanKeysByPrefix(prefix: string): Promise<string[]> {
    this.guard("scanKeysByPrefix");
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix) && this.live(key) !== undefined);
  }

  async pruneAndCount(key: string, minScore: number): Promise<number> {
    this.guard("pruneAndCount");
    const entry = this.live(key);
    if (!entry) return 0;
    if (entry.kind !== "zset") throw new Error(WRONGTYPE);

    for (const [member, score] of entry.members) {
      if (score < minScore) entry.members.delete(member);
    }
    if (entry.members.size === 0) {
      this.entries.delete(key);
    }
    return entry.members.size;
  }

  async recordHit(key: string, score: number, member: string, ttlMs: number): Promise<void> {
    this.guard("recordHit");
    const existing = this.live(key);
    if (existing && existing.kind !== "zset") throw new Error(WRONGTYPE);

    const members = existing ? existing.members : new Map<string, number>();
    members.set(member, score);
    this.entries.set(key, {
      kind: "zset",
      members,
      expiresAt: this.now() + Math.max(1, Math.ceil(ttlMs)),
    });
  }

  async ping(): Promise<boolean> {
    this.guard("ping");
    return true;
  }

  async disconnect(): Promise<void> {
    this.entries.clear();
  }
}
