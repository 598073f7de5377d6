// =============================================================================
// @trendwire/shared — URL-keyed deduplication
// =============================================================================
// Removes records already persisted (cross-run) and repeats inside a batch.
// Two URLs are the same item when they are equal after normalizeUrl().
// =============================================================================

import type { NewsRecord } from "../types.js";

/**
 * Identity form of a URL: lower-cased, `http://` forced to `https://`,
 * trailing slashes stripped.
 */
export function normalizeUrl(url: string): string {
  return url
    .trim()
    .toLowerCase()
    .replace(/^http:\/\//, "https://")
    .replace(/\/+$/, "");
}

/**
 * Keeps the first occurrence of each normalized URL, in input order.
 * `knownUrls` are treated as already seen.
 */
export function deduplicate(
  candidates: readonly NewsRecord[],
  knownUrls: Iterable<string> = [],
): NewsRecord[] {
  const seen = new Set<string>();
  for (const url of knownUrls) seen.add(normalizeUrl(url));

  const result: NewsRecord[] = [];
  for (const record of candidates) {
    const key = normalizeUrl(record.url);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(record);
  }
  return result;
}
