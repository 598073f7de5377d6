// =============================================================================
// @trendwire/shared — Threshold filter
// =============================================================================
// Admit/reject only; admitted records pass through untouched and in order.
// The filter keeps no state between calls.
// =============================================================================

import type { NewsRecord } from "../types.js";
import { parsePublishedAt } from "./record.js";

export interface Thresholds {
  forum_min_score: number;
}

/** Clock-skew tolerance for timestamps in the future */
export const FUTURE_TOLERANCE_MS = 60 * 60 * 1000;

/** Returns the reason a record is rejected, or null when it is admitted. */
export function rejectionReason(
  record: NewsRecord,
  thresholds: Thresholds,
  now: Date,
): string | null {
  if (!record.title.trim()) return "blank title";
  if (!record.url.trim()) return "blank url";
  if (
    record.source_type === "forum" &&
    record.raw_score < thresholds.forum_min_score
  ) {
    return "below forum threshold";
  }

  const published = parsePublishedAt(record.published_at);
  if (!published) return "malformed published_at";
  if (published.getTime() > now.getTime() + FUTURE_TOLERANCE_MS) {
    return "published in the future";
  }
  return null;
}

export function filterRecords(
  candidates: readonly NewsRecord[],
  thresholds: Thresholds,
  now: Date = new Date(),
): NewsRecord[] {
  return candidates.filter(
    (record) => rejectionReason(record, thresholds, now) === null,
  );
}
