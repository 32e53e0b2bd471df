/**
 * @shortkit/shared - Shared Package Exports
 *
 * Types, error kinds, constants and pure utilities used by every other
 * package. Nothing in here performs I/O.
 *
 * ```ts
 * import { toShortCode, computeContentHash, NotFoundError } from "@shortkit/shared";
 * ```
 */

// Types (UrlRecord, CachedUrlSnapshot, UrlStats, ...)
export * from "./types/index.js";

// Error kinds (ValidationError, NotFoundError, ExpiredError, StoreError, ...)
export * from "./errors.js";

// Utilities (short codes, hashing, URL and duration parsing, validity)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, CACHE_KEYS, CLICK_SYNC, RATE_LIMIT, ...)
export * from "./constants/index.js";
