/**
 * In-Process URL Repository
 *
 * UrlRepository held in Maps, mirroring the PostgreSQL semantics (hash
 * upsert, nullable short code, NotFoundError on missing codes). Used by
 * tests and by local runs without PostgreSQL.
 */

import { NotFoundError, StoreError, isRecordValid, type UrlRecord } from "@shortkit/shared";
import type { UrlRepository } from "./repository.js";
import { toUrlRecord, type InsertUrlResult, type StoredUrlRecord } from "./types.js";

export type UrlRepositoryOperation = keyof UrlRepository;

export interface MemoryUrlRepositoryOptions {
  /** Clock (default: () => new Date()) */
  now?: () => Date;
}

export class MemoryUrlRepository implements UrlRepository {
  private readonly rows = new Map<bigint, StoredUrlRecord>();
  private readonly now: () => Date;
  private readonly pendingFaults: { operation: UrlRepositoryOperation; error: unknown }[] = [];
  private nextId = 1n;
  private available = true;

  constructor(options: MemoryUrlRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  // ===========================================================================
  // Fault Injection & Test Helpers
  // ===========================================================================

  /** Make the next call to `operation` reject with a StoreError */
  failNext(operation: UrlRepositoryOperation, error: unknown = new StoreError(`Injected ${operation} failure`)): void {
    this.pendingFaults.push({ operation, error });
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Overwrite fields of a stored record, e.g. to deactivate it */
  update(id: bigint, changes: Partial<Omit<StoredUrlRecord, "id">>): void {
    const row = this.rows.get(id);
    if (!row) throw new NotFoundError(`No url with id ${id}`);
    this.rows.set(id, { ...row, ...changes });
  }

  all(): StoredUrlRecord[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  private guard(operation: UrlRepositoryOperation): void {
    if (!this.available) {
      throw new StoreError(`Failed to ${operation}: database unavailable`);
    }
    const index = this.pendingFaults.findIndex((f) => f.operation === operation);
    if (index !== -1) {
      const [fault] = this.pendingFaults.splice(index, 1);
      throw fault.error;
    }
  }

  private byHash(contentHash: string): StoredUrlRecord | undefined {
    for (const row of this.rows.values()) {
      if (row.contentHash === contentHash) return row;
    }
    return undefined;
  }

  private byCode(shortCode: string): UrlRecord | null {
    for (const row of this.rows.values()) {
      if (row.shortCode === shortCode) return toUrlRecord({ ...row });
    }
    return null;
  }

  // ===========================================================================
  // UrlRepository
  // ===========================================================================

  async insert(contentHash: string, destinationUrl: string, expiresAt: Date | null): Promise<InsertUrlResult> {
    this.guard("insert");
    const now = this.now();
    const existing = this.byHash(contentHash);

    if (existing && isRecordValid(existing, now)) {
      return { created: false, record: { ...existing } };
    }
    if (existing) {
      this.rows.delete(existing.id);
    }

    const record: StoredUrlRecord = {
      id: this.nextId++,
      shortCode: null,
      contentHash,
      destinationUrl,
      clickCount: 0,
      createdAt: now,
      updatedAt: now,
      expiresAt,
      active: true,
    };
    this.rows.set(record.id, record);
    return { created: true, record: { ...record } };
  }

  async findByHash(contentHash: string): Promise<StoredUrlRecord | null> {
    this.guard("findByHash");
    const row = this.byHash(contentHash);
    return row ? { ...row } : null;
  }

  async findByCode(shortCode: string): Promise<UrlRecord> {
    this.guard("findByCode");
    const record = this.byCode(shortCode);
    if (!record) throw new NotFoundError();
    return record;
  }

  async getByCode(shortCode: string): Promise<UrlRecord> {
    this.guard("getByCode");
    const record = this.byCode(shortCode);
    if (!record) throw new NotFoundError();
    return record;
  }

  async setCode(id: bigint, shortCode: string): Promise<void> {
    this.guard("setCode");
    const row = this.rows.get(id);
    if (!row) throw new NotFoundError(`No url with id ${id}`);

    for (const other of this.rows.values()) {
      if (other.id !== id && other.shortCode === shortCode) {
        throw new StoreError(`Short code ${shortCode} already assigned`);
      }
    }
    this.rows.set(id, { ...row, shortCode, updatedAt: this.now() });
  }

  async addClicks(shortCode: string, count: number): Promise<number> {
    this.guard("addClicks");
    for (const row of this.rows.values()) {
      if (row.shortCode === shortCode) {
        this.rows.set(row.id, { ...row, clickCount: row.clickCount + count, updatedAt: this.now() });
        return 1;
      }
    }
    return 0;
  }

  async ping(): Promise<boolean> {
    return this.available;
  }
}
