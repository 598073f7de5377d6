// =============================================================================
// @trendwire/shared — Ranking + the full scoring pipeline
// =============================================================================

import type { KeywordTable } from "../schemas.js";
import type { Category, NewsRecord } from "../types.js";
import { classify } from "./classifier.js";
import { deduplicate } from "./deduplicator.js";
import { filterRecords, type Thresholds } from "./filter.js";
import { scoreRecords } from "./scorer.js";

/** Score descending; ties keep their prior relative order. */
export function rankRecords(records: readonly NewsRecord[]): NewsRecord[] {
  return records
    .map((record, position) => ({ record, position }))
    .sort((a, b) => b.record.score - a.record.score || a.position - b.position)
    .map(({ record }) => record);
}

export interface ProcessOptions {
  keywordTable: KeywordTable;
  thresholds: Thresholds;
  knownUrls?: Iterable<string>;
  pinnedCategories?: readonly Category[];
  now?: Date;
}

/** dedupe -> classify -> filter -> score -> rank */
export function processRecords(
  candidates: readonly NewsRecord[],
  options: ProcessOptions,
): NewsRecord[] {
  const now = options.now ?? new Date();

  const unique = deduplicate(candidates, options.knownUrls);
  const classified = classify(unique, options.keywordTable, {
    pinnedCategories: options.pinnedCategories,
  });
  const admitted = filterRecords(classified, options.thresholds, now);
  return rankRecords(scoreRecords(admitted, now));
}
