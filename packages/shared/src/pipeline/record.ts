import type { NewRecordInput, NewsRecord } from "../types.js";

/** Max characters of summary text a producer keeps per record */
export const CONTENT_MAX_CHARS = 500;

/**
 * Builds a fetch-time record: score 0, not breaking, no tags. Content is
 * truncated to CONTENT_MAX_CHARS.
 */
export function createRecord(input: NewRecordInput): NewsRecord {
  return {
    title: input.title,
    url: input.url,
    source: input.source,
    source_type: input.source_type,
    category: input.category,
    published_at: input.published_at,
    content: (input.content ?? "").slice(0, CONTENT_MAX_CHARS),
    score: 0,
    is_breaking_change: false,
    tags: [],
    raw_score: input.raw_score ?? 0,
    extra: { ...input.extra },
  };
}

/** Parses a record timestamp; null when missing or malformed. */
export function parsePublishedAt(value: string): Date | null {
  if (!value) return null;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}
