/**
 * Record validity
 *
 * A record may resolve iff it is active and not past its expiry.
 * The same rule applies to durable records and cached snapshots.
 */

import type { ValidityFields } from "../types/index.js";

export function isRecordValid(record: ValidityFields, now: Date = new Date()): boolean {
  if (!record.active) return false;
  if (record.expiresAt === null) return true;
  return record.expiresAt.getTime() > now.getTime();
}

/**
 * Whole seconds until the record expires, or null when it never expires.
 * Zero or negative means already expired.
 */
export function secondsUntilExpiry(record: ValidityFields, now: Date = new Date()): number | null {
  if (record.expiresAt === null) return null;
  return Math.floor((record.expiresAt.getTime() - now.getTime()) / 1000);
}
