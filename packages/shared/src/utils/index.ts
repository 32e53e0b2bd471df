// Short code encoding (Base62, padding, lenient decode)
export {
  encodeBase62,
  decodeBase62,
  decodeBase62Number,
  toShortCode,
  isShortCodeFormat,
} from "./shortcode.js";

// Dedup key
export { computeContentHash } from "./hash.js";

// Input validation
export { validateDestinationUrl } from "./url.js";
export { parseDuration } from "./duration.js";

// Record validity
export { isRecordValid, secondsUntilExpiry } from "./validity.js";
