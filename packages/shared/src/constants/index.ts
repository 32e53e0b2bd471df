/**
 * Short Code Configuration Constants
 *
 * Single source of truth for short code encoding parameters.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Base62 alphabet: 0-9A-Za-z
   * URL-safe, case-sensitive. The first symbol doubles as the padding symbol.
   */
  ALPHABET: "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz",

  /** Numeric base of the alphabet */
  BASE: 62,

  /**
   * Minimum length of a generated code. Shorter encodings are left-padded.
   * 6 chars = 62^6 ≈ 56.8 billion IDs before codes grow a seventh symbol.
   */
  MIN_LENGTH: 6,

  /** Longest code the request layer will look up (column width) */
  MAX_LENGTH: 16,
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum destination URL length to store */
  MAX_LENGTH: 2048,

  /** Longest lifetime a short URL may be given (3650 days) */
  MAX_LIFETIME_MS: 3650 * 24 * 60 * 60 * 1000,

  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,
} as const;

/**
 * Fast Store key prefixes, versioned so a format change can roll out
 * without reading stale payloads.
 *
 *   sk:v1:url:{shortCode}                 - cached URL snapshot (JSON)
 *   sk:v1:clicks:{shortCode}              - pending click counter (integer)
 *   sk:v1:ratelimit:{scope}:{identity}    - sliding window (sorted set)
 */
export const CACHE_KEYS = {
  URL_PREFIX: "sk:v1:url:",
  CLICKS_PREFIX: "sk:v1:clicks:",
  RATE_LIMIT_PREFIX: "sk:v1:ratelimit:",
} as const;

/**
 * Snapshot TTL settings
 */
export const CACHE_TTL = {
  /** Ceiling for a cached URL snapshot (1 hour) */
  URL_SECONDS: 3600,

  /** ±8% jitter on the ceiling so hot keys written together don't expire together */
  JITTER_PERCENT: 0.08,
} as const;

/**
 * Click counter reconciliation settings
 */
export const CLICK_SYNC = {
  /** Time between scheduled reconciliation runs (1 hour) */
  INTERVAL_MS: 60 * 60 * 1000,

  /** Deadline for a single run (5 minutes) */
  RUN_TIMEOUT_MS: 5 * 60 * 1000,

  /** Deadline for a single click increment on the resolve path */
  INCREMENT_TIMEOUT_MS: 200,

  /** SCAN page size when enumerating counters */
  SCAN_COUNT: 100,
} as const;

/**
 * Sliding window rate limit defaults
 */
export const RATE_LIMIT = {
  /** General traffic: 100 requests per minute */
  DEFAULT: { requests: 100, windowMs: 60_000 },

  /** Short URL creation: 10 requests per minute */
  CREATE: { requests: 10, windowMs: 60_000 },
} as const;
