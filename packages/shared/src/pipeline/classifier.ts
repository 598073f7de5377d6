// =============================================================================
// @trendwire/shared — Keyword classifier + breaking-change detection
// =============================================================================
// Assigns category, breaking-change flag and tags by substring matching over
// the lower-cased "title content" haystack. Deterministic, no I/O.
// =============================================================================

import type { KeywordTable } from "../schemas.js";
import {
  DETECTABLE_CATEGORIES,
  type Category,
  type NewsRecord,
} from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const BREAKING_CHANGE_PHRASES = [
  "breaking change",
  "breaking:",
  "breaking -",
  "deprecated",
  "deprecation",
  "removed in",
  "removal of",
  "migration guide",
  "migration required",
  "incompatible",
  "backward incompatible",
  "no longer supported",
] as const;

export const MAX_TAGS = 5;

export interface ClassifierOptions {
  /**
   * Further categories a producer may set that the classifier must not
   * overwrite. "paper" is always pinned.
   */
  pinnedCategories?: readonly Category[];
}

const ALWAYS_PINNED: readonly Category[] = ["paper"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function haystackOf(record: NewsRecord): string {
  return `${record.title} ${record.content}`.toLowerCase();
}

export function detectCategory(
  haystack: string,
  keywordTable: KeywordTable,
): Category {
  for (const category of DETECTABLE_CATEGORIES) {
    const words = keywordTable[category] ?? [];
    if (words.some((w) => haystack.includes(w))) return category;
  }
  return "other";
}

export function isBreakingChange(haystack: string): boolean {
  return BREAKING_CHANGE_PHRASES.some((phrase) => haystack.includes(phrase));
}

/**
 * `[category]` followed by the first matching keyword of each group (in
 * table order) that is not already a tag, capped at MAX_TAGS.
 */
export function extractTags(
  haystack: string,
  category: Category,
  keywordTable: KeywordTable,
): string[] {
  const tags: string[] = [category];
  for (const words of Object.values(keywordTable)) {
    const hit = words.find((w) => haystack.includes(w) && !tags.includes(w));
    if (hit !== undefined) tags.push(hit);
  }
  return tags.slice(0, MAX_TAGS);
}

// ---------------------------------------------------------------------------
// Stage
// ---------------------------------------------------------------------------

export function classify(
  candidates: readonly NewsRecord[],
  keywordTable: KeywordTable,
  options: ClassifierOptions = {},
): NewsRecord[] {
  const pinned = new Set<Category>([
    ...ALWAYS_PINNED,
    ...(options.pinnedCategories ?? []),
  ]);

  return candidates.map((record) => {
    const haystack = haystackOf(record);
    const category = pinned.has(record.category)
      ? record.category
      : detectCategory(haystack, keywordTable);

    return {
      ...record,
      category,
      is_breaking_change: isBreakingChange(haystack),
      tags: extractTags(haystack, category, keywordTable),
    };
  });
}
