/**
 * Shared Type Definitions
 *
 * Domain types used across the cache, db, analytics and api packages.
 */

// =============================================================================
// URL Record
// =============================================================================

/**
 * Authoritative URL record as stored in the durable store.
 *
 * `clickCount` only reflects reconciled clicks; pending clicks live in the
 * fast store until the next reconciliation run.
 */
export interface UrlRecord {
  /** Monotonically assigned identity, source of the short code */
  id: bigint;

  /** Base62 encoding of `id`, left-padded to the configured minimum length */
  shortCode: string;

  /** SHA-256 hex digest of the destination URL (dedup key) */
  contentHash: string;

  /** Destination URL */
  destinationUrl: string;

  /** Reconciled click total */
  clickCount: number;

  createdAt: Date;
  updatedAt: Date;

  /** Optional expiry; null means the link never expires */
  expiresAt: Date | null;

  /** Inactive records never resolve */
  active: boolean;
}

/**
 * Minimal shape needed to decide whether a record may resolve.
 */
export type ValidityFields = Pick<UrlRecord, "active" | "expiresAt">;

/**
 * Denormalized URL record held in the fast store.
 *
 * Stored as JSON: bigint and Date fields are serialized to strings.
 * Key format: sk:v1:url:{shortCode}
 */
export interface CachedUrlSnapshot {
  id: string;
  shortCode: string;
  contentHash: string;
  destinationUrl: string;
  clickCount: number;
  createdAt: string;
  updatedAt: string;
  expiresAt: string | null;
  active: boolean;

  /** Unix timestamp (ms) when cached */
  cachedAt: number;
}

// =============================================================================
// Service Results
// =============================================================================

export interface CreateShortUrlInput {
  /** Absolute http/https destination URL */
  url: string;

  /** Optional lifetime such as "24h" or "7d" */
  expiresIn?: string;
}

export interface CreateShortUrlResult {
  shortCode: string;

  /** Canonical short URL: {baseUrl}/{shortCode} */
  shortUrl: string;

  destinationUrl: string;
  expiresAt: Date | null;
}

export interface UrlStats {
  shortCode: string;
  destinationUrl: string;

  /** Reconciled clicks plus clicks still pending in the fast store */
  totalClicks: number;

  createdAt: Date;
  expiresAt: Date | null;
  active: boolean;
}

/**
 * Result of a shared validation helper
 */
export interface ValidationResult {
  valid: boolean;
  error?: string;
}
