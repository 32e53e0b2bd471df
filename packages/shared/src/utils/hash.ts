/**
 * Content Hashing
 *
 * The dedup key for a destination URL: SHA-256 over the exact URL string,
 * hex encoded (64 characters). No normalisation is applied, so URLs that
 * differ only in case or trailing slash get different short codes.
 */

import { createHash } from "node:crypto";

export function computeContentHash(url: string): string {
  return createHash("sha256").update(url, "utf8").digest("hex");
}
