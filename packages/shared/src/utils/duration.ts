/**
 * Duration parsing for link lifetimes and configuration values.
 *
 * Accepts one or more `<amount><unit>` segments with units ms, s, m, h, d:
 *   "90s", "30m", "24h", "1h30m", "1.5h", "7d"
 * The bare string "0" is accepted as zero.
 */

import { ValidationError } from "../errors.js";

const SEGMENT_PATTERN = /(\d+(?:\.\d+)?)(ms|s|m|h|d)/y;

function unitToMs(unit: string): number {
  switch (unit) {
    case "ms":
      return 1;
    case "s":
      return 1000;
    case "m":
      return 60 * 1000;
    case "h":
      return 60 * 60 * 1000;
    case "d":
      return 24 * 60 * 60 * 1000;
    default:
      throw new ValidationError(`Unknown duration unit: "${unit}"`);
  }
}

/**
 * Parse a duration string into milliseconds (rounded to whole ms).
 *
 * @throws ValidationError if the string is empty, malformed or too large to
 * represent in whole milliseconds
 */
export function parseDuration(input: string): number {
  const value = input.trim();
  if (value === "") {
    throw new ValidationError("Duration must not be empty");
  }

  if (value === "0") {
    return 0;
  }

  const pattern = new RegExp(SEGMENT_PATTERN.source, "y");
  let total = 0;
  let offset = 0;

  while (offset < value.length) {
    pattern.lastIndex = offset;
    const match = pattern.exec(value);
    if (!match) {
      throw new ValidationError(`Invalid duration: "${input}"`);
    }

    const [, amount, unit] = match;
    total += Number(amount) * unitToMs(unit);
    offset = pattern.lastIndex;
  }

  const ms = Math.round(total);
  if (!Number.isSafeInteger(ms)) {
    throw new ValidationError(`Duration out of range: "${input}"`);
  }
  return ms;
}
