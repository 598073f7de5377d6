// =============================================================================
// @trendwire/shared — Zod schemas for persisted files and MCP tool inputs
// =============================================================================
// Persisted snapshot, archive and marker files are parsed through these
// schemas on every read so that downstream code can trust loaded records.
// Defaults keep older files readable when optional fields are missing.
// =============================================================================

import { z } from "zod";
import {
  CATEGORIES,
  SOURCE_TYPES,
  type LastRunMarker,
  type NewsRecord,
} from "./types.js";

// ---------------------------------------------------------------------------
// Reusable field schemas
// ---------------------------------------------------------------------------

const sourceTypeSchema = z.enum(SOURCE_TYPES);

const categorySchema = z.enum(CATEGORIES);

/** YYYY-MM */
const monthSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, "Month must be formatted YYYY-MM");

// ---------------------------------------------------------------------------
// NewsRecord exchange format
// ---------------------------------------------------------------------------

export const NewsRecordSchema: z.ZodType<NewsRecord, z.ZodTypeDef, unknown> =
  z.object({
    title: z.string(),
    url: z.string(),
    source: z.string(),
    source_type: sourceTypeSchema,
    category: categorySchema,
    // Not validated as a date here: unparseable dates are tolerated on load
    // and rejected by the threshold filter on ingest.
    published_at: z.string().min(1),
    content: z.string().default(""),
    score: z.number().min(0).max(100).default(0),
    is_breaking_change: z.boolean().default(false),
    tags: z.array(z.string()).default([]),
    raw_score: z.number().int().default(0),
    extra: z.record(z.unknown()).default({}),
  });

// ---------------------------------------------------------------------------
// File envelopes (items validated one by one by the store)
// ---------------------------------------------------------------------------

export const SnapshotEnvelopeSchema = z.object({
  generated_at: z.string(),
  total: z.number().int().min(0),
  items: z.array(z.unknown()),
});

export const ArchiveEnvelopeSchema = z.object({
  month: monthSchema,
  last_updated: z.string(),
  total: z.number().int().min(0),
  items: z.array(z.unknown()),
});

export const LastRunMarkerSchema: z.ZodType<
  LastRunMarker,
  z.ZodTypeDef,
  unknown
> = z.object({
  last_run_at: z
    .string()
    .refine((v) => !Number.isNaN(Date.parse(v)), "Invalid timestamp"),
});

// ---------------------------------------------------------------------------
// Classifier keyword table
// ---------------------------------------------------------------------------

/**
 * Category -> keyword list. Group order is significant (it drives tag order),
 * and keywords are lower-cased on load.
 */
export const KeywordTableSchema = z
  .record(z.array(z.string().trim().min(1)))
  .transform((table) => {
    const normalized: Record<string, string[]> = {};
    for (const [group, words] of Object.entries(table)) {
      normalized[group] = [...new Set(words.map((w) => w.toLowerCase()))];
    }
    return normalized;
  });
export type KeywordTable = z.infer<typeof KeywordTableSchema>;

// ---------------------------------------------------------------------------
// MCP tool inputs
// ---------------------------------------------------------------------------

export const AskQuestionInput = z.object({
  question: z
    .string()
    .min(1)
    .max(2000)
    .describe("Natural-language question about recent AI news"),
});
export type AskQuestionInput = z.infer<typeof AskQuestionInput>;

export const SearchRecordsInput = z.object({
  query: z.string().min(1).max(2000).describe("Semantic search query"),
  top_k: z
    .number()
    .int()
    .min(1)
    .max(50)
    .optional()
    .describe("Max results (default: 5)"),
});
export type SearchRecordsInput = z.infer<typeof SearchRecordsInput>;

export const LatestRecordsInput = z.object({
  limit: z
    .number()
    .int()
    .min(1)
    .max(200)
    .optional()
    .describe("Max records to return (default: 20)"),
  category: categorySchema.optional().describe("Filter to one category"),
  source_type: sourceTypeSchema.optional().describe("Filter to one source type"),
  breaking_only: z
    .boolean()
    .optional()
    .describe("Only records flagged as breaking changes"),
});
export type LatestRecordsInput = z.infer<typeof LatestRecordsInput>;

export const ExplainScoreInput = z.object({
  url: z.string().min(1).describe("URL of a record in the rolling snapshot"),
});
export type ExplainScoreInput = z.infer<typeof ExplainScoreInput>;
