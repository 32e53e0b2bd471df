/**
 * Destination URL validation
 */

import { URL_CONFIG } from "../constants/index.js";
import type { ValidationResult } from "../types/index.js";

const ALLOWED_PROTOCOLS: readonly string[] = URL_CONFIG.ALLOWED_PROTOCOLS;

/**
 * Validate a destination URL.
 *
 * Rules:
 * - At most URL_CONFIG.MAX_LENGTH characters
 * - Absolute, with a host
 * - http or https only
 *
 * @example
 * ```ts
 * validateDestinationUrl("https://example.com/a") // { valid: true }
 * validateDestinationUrl("ftp://example.com")     // { valid: false, error: "..." }
 * ```
 */
export function validateDestinationUrl(raw: string): ValidationResult {
  if (raw.length === 0) {
    return { valid: false, error: "URL is required" };
  }

  if (raw.length > URL_CONFIG.MAX_LENGTH) {
    return {
      valid: false,
      error: `URL must be at most ${URL_CONFIG.MAX_LENGTH} characters`,
    };
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return { valid: false, error: "Invalid URL" };
  }

  if (!ALLOWED_PROTOCOLS.includes(parsed.protocol)) {
    return { valid: false, error: "Only http/https URLs are allowed" };
  }

  if (parsed.hostname === "") {
    return { valid: false, error: "Invalid URL" };
  }

  return { valid: true };
}
