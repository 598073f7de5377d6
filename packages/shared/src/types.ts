// =============================================================================
// @trendwire/shared — Core record types
// =============================================================================
// The NewsRecord is the unit of work flowing through every pipeline stage.
// Field names match the persisted exchange format so records round-trip
// through the snapshot, archive and vector index without a mapping layer.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

export const SOURCE_TYPES = ["github", "rss", "forum", "paper"] as const;

/** Kind of producer that created a record */
export type SourceType = (typeof SOURCE_TYPES)[number];

export const CATEGORIES = [
  "framework",
  "llm",
  "rag",
  "agent",
  "workflow",
  "paper",
  "other",
] as const;

/** Topic category assigned by the classifier (or pinned by the producer) */
export type Category = (typeof CATEGORIES)[number];

/** Categories the classifier may detect, in priority order */
export const DETECTABLE_CATEGORIES = [
  "framework",
  "llm",
  "rag",
  "agent",
  "workflow",
] as const satisfies readonly Category[];

export type DetectableCategory = (typeof DETECTABLE_CATEGORIES)[number];

// ---------------------------------------------------------------------------
// NewsRecord
// ---------------------------------------------------------------------------

/**
 * One article, release, post or paper.
 *
 * `extra` is an open bag of source-specific metadata. Documented keys:
 * - github: `stars`, `version`, `repo`
 * - forum: `hn_id`, `comments`
 * - paper: `stars`, `feed`
 * - rss: `feed_category`
 * - any, once scored: `scored_at` (ISO-8601)
 */
export interface NewsRecord {
  title: string;
  url: string;
  source: string;
  source_type: SourceType;
  category: Category;
  /** ISO-8601 UTC timestamp */
  published_at: string;
  content: string;
  score: number;
  is_breaking_change: boolean;
  tags: string[];
  raw_score: number;
  extra: Record<string, unknown>;
}

/** Fields a producer must supply; the rest start at their fetch-time defaults */
export type NewRecordInput = Pick<
  NewsRecord,
  "title" | "url" | "source" | "source_type" | "category" | "published_at"
> &
  Partial<Pick<NewsRecord, "content" | "raw_score" | "extra">>;

// ---------------------------------------------------------------------------
// Persisted envelopes
// ---------------------------------------------------------------------------

export interface StoreSnapshot {
  generated_at: string;
  total: number;
  items: NewsRecord[];
}

export interface ArchiveShard {
  /** YYYY-MM */
  month: string;
  last_updated: string;
  total: number;
  items: NewsRecord[];
}

export interface LastRunMarker {
  last_run_at: string;
}

// ---------------------------------------------------------------------------
// Retrieval
// ---------------------------------------------------------------------------

/** Metadata projection stored beside each embedding */
export interface IndexedMetadata {
  title: string;
  url: string;
  source: string;
  category: Category;
  published_at: string;
  score: number;
}

export interface SearchHit extends IndexedMetadata {
  content: string;
  similarity: number;
}
