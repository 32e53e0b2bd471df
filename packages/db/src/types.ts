/**
 * Database Type Definitions
 *
 * Row shapes of the `urls` table and their mapping to domain records.
 *
 * @see migrations/001_init.sql for the authoritative schema
 */

import type { QueryResultRow } from "pg";
import { StoreError, type UrlRecord } from "@shortkit/shared";

// =============================================================================
// TABLE: urls
// =============================================================================

/**
 * A stored record whose short code may not be assigned yet: the code is
 * derived from `id`, so it is written by a second statement after insert.
 */
export type StoredUrlRecord = Omit<UrlRecord, "shortCode"> & { shortCode: string | null };

export interface InsertUrlResult {
  /** False when a valid record with the same content hash already existed */
  created: boolean;
  record: StoredUrlRecord;
}

/** Columns selected by every query returning a record */
export const URL_COLUMNS =
  "id, short_code, url_hash, original_url, click_count, created_at, updated_at, expires_at, is_active";

// =============================================================================
// Row Mapping
// =============================================================================

function fail(column: string): never {
  throw new StoreError(`Unexpected value in urls.${column}`);
}

/** BIGINT columns arrive as strings from pg */
function toBigInt(value: unknown, column: string): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  return fail(column);
}

function toCount(value: unknown, column: string): number {
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n === "number" && Number.isSafeInteger(n) && n >= 0) return n;
  return fail(column);
}

function toDate(value: unknown, column: string): Date {
  if (value instanceof Date) return value;
  if (typeof value === "string") {
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date;
  }
  return fail(column);
}

function toText(value: unknown, column: string): string {
  return typeof value === "string" ? value : fail(column);
}

export function toStoredUrlRecord(row: QueryResultRow): StoredUrlRecord {
  const shortCode: unknown = row.short_code;
  const expiresAt: unknown = row.expires_at;
  const active: unknown = row.is_active;

  return {
    id: toBigInt(row.id, "id"),
    shortCode: shortCode === null ? null : toText(shortCode, "short_code"),
    contentHash: toText(row.url_hash, "url_hash").trim(),
    destinationUrl: toText(row.original_url, "original_url"),
    clickCount: toCount(row.click_count, "click_count"),
    createdAt: toDate(row.created_at, "created_at"),
    updatedAt: toDate(row.updated_at, "updated_at"),
    expiresAt: expiresAt === null ? null : toDate(expiresAt, "expires_at"),
    active: typeof active === "boolean" ? active : fail("is_active"),
  };
}

/**
 * Narrow a stored record to one with an assigned short code.
 */
export function toUrlRecord(record: StoredUrlRecord): UrlRecord | null {
  const { shortCode } = record;
  return shortCode === null ? null : { ...record, shortCode };
}
