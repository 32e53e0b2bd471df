/**
 * Short Code Encoding
 *
 * Short codes are derived from the durable store's numeric identity:
 *
 *   id ──encodeBase62──▶ "G7" ──pad to MIN_LENGTH──▶ "0000G7"
 *
 * Encoding is positional Base62 over 0-9A-Za-z, most-significant symbol
 * first. Because IDs are unique, codes are unique without any collision
 * check, and `decodeBase62` recovers the ID from a code.
 *
 * Decoding is lenient: a symbol outside the alphabet counts as the zero
 * symbol instead of failing. `isShortCodeFormat` is the strict check.
 */

import { SHORTCODE_CONFIG } from "../constants/index.js";

const { ALPHABET, MIN_LENGTH, MAX_LENGTH } = SHORTCODE_CONFIG;
const BASE = BigInt(SHORTCODE_CONFIG.BASE);
const ZERO_SYMBOL = ALPHABET.charAt(0);

const SHORT_CODE_PATTERN = new RegExp(`^[0-9A-Za-z]{1,${MAX_LENGTH}}$`);

// =============================================================================
// Encoding
// =============================================================================

function toBigInt(id: number | bigint): bigint {
  if (typeof id === "bigint") return id;
  if (!Number.isSafeInteger(id)) {
    throw new RangeError(`Cannot encode non-integer or unsafe number: ${id}`);
  }
  return BigInt(id);
}

/**
 * Encode a non-negative integer to Base62.
 *
 * @throws RangeError if `id` is negative or not a safe integer
 *
 * @example
 * ```ts
 * encodeBase62(0)     // "0"
 * encodeBase62(61)    // "z"
 * encodeBase62(62)    // "10"
 * encodeBase62(12345) // "3D7"
 * ```
 */
export function encodeBase62(id: number | bigint): string {
  let n = toBigInt(id);
  if (n < 0n) {
    throw new RangeError("Cannot encode negative number to Base62");
  }

  if (n === 0n) {
    return ZERO_SYMBOL;
  }

  let result = "";
  while (n > 0n) {
    result = ALPHABET.charAt(Number(n % BASE)) + result;
    n /= BASE;
  }

  return result;
}

/**
 * Derive the short code for a record ID: Base62, left-padded with the zero
 * symbol to `minLength`.
 *
 * @example
 * ```ts
 * toShortCode(1)         // "000001"
 * toShortCode(12345, 4)  // "03D7"
 * ```
 */
export function toShortCode(id: number | bigint, minLength: number = MIN_LENGTH): string {
  return encodeBase62(id).padStart(minLength, ZERO_SYMBOL);
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode a Base62 string to its integer value.
 *
 * Unrecognised symbols contribute 0, so `decodeBase62("1-")` equals
 * `decodeBase62("10")`. Leading zero symbols (padding) do not change the value.
 */
export function decodeBase62(code: string): bigint {
  let result = 0n;

  for (const char of code) {
    const index = ALPHABET.indexOf(char);
    result = result * BASE + BigInt(index === -1 ? 0 : index);
  }

  return result;
}

/**
 * `decodeBase62` for callers that work with plain numbers.
 *
 * @throws RangeError if the value exceeds Number.MAX_SAFE_INTEGER
 */
export function decodeBase62Number(code: string): number {
  const value = decodeBase62(code);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`Decoded value exceeds safe integer range: ${code}`);
  }
  return Number(value);
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Strict format check: 1..MAX_LENGTH alphabet symbols.
 * Used to reject garbage lookups before any I/O.
 */
export function isShortCodeFormat(code: string): boolean {
  return SHORT_CODE_PATTERN.test(code);
}
