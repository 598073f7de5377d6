// =============================================================================
// @trendwire/shared — Additive relevance scorer
// =============================================================================
// score = source weight + category weight + breaking bonus
//       + community heat (0..25) + recency (0..20)
// rounded to one decimal and clamped to [0, 100]. Every term comes from a
// fixed table so any score can be audited with explainScore().
// =============================================================================

import type { Category, NewsRecord, SourceType } from "../types.js";
import { parsePublishedAt } from "./record.js";

// ---------------------------------------------------------------------------
// Weight tables
// ---------------------------------------------------------------------------

export const SOURCE_WEIGHTS: Readonly<Record<SourceType, number>> = {
  github: 25,
  rss: 30,
  paper: 22,
  forum: 18,
};
const DEFAULT_SOURCE_WEIGHT = 10;

export const CATEGORY_WEIGHTS: Readonly<Record<Category, number>> = {
  llm: 25,
  framework: 22,
  paper: 20,
  rag: 18,
  agent: 18,
  workflow: 15,
  other: 8,
};
const DEFAULT_CATEGORY_WEIGHT = 8;

export const BREAKING_CHANGE_BONUS = 15;
export const MAX_HEAT = 25;
export const MAX_SCORE = 100;

const HOUR_MS = 60 * 60 * 1000;

/** [max age in hours, points], checked in order */
const RECENCY_STEPS: ReadonlyArray<readonly [number, number]> = [
  [24, 20],
  [48, 15],
  [24 * 7, 10],
  [24 * 30, 5],
];
const STALE_RECENCY = 2;

// ---------------------------------------------------------------------------
// Terms
// ---------------------------------------------------------------------------

export interface ScoreBreakdown {
  source: number;
  category: number;
  breaking: number;
  heat: number;
  recency: number;
  total: number;
}

function starsOf(record: NewsRecord): number {
  const stars = record.extra["stars"];
  return typeof stars === "number" && Number.isFinite(stars) ? stars : 0;
}

function communityHeat(record: NewsRecord): number {
  switch (record.source_type) {
    case "forum":
      return Math.min((record.raw_score / 500) * MAX_HEAT, MAX_HEAT);
    case "paper":
      return Math.min((starsOf(record) / 1000) * MAX_HEAT, MAX_HEAT);
    case "github": {
      const stars = starsOf(record);
      return stars > 0 ? Math.min((stars / 100_000) * MAX_HEAT, MAX_HEAT) : 10;
    }
    case "rss":
      return 10;
  }
}

function recency(record: NewsRecord, now: Date): number {
  const published = parsePublishedAt(record.published_at);
  if (!published) return STALE_RECENCY;

  const hours = (now.getTime() - published.getTime()) / HOUR_MS;
  for (const [maxHours, points] of RECENCY_STEPS) {
    if (hours <= maxHours) return points;
  }
  return STALE_RECENCY;
}

/**
 * Half-to-even at one decimal, on the exact binary value. The only doubles
 * lying exactly between two tenths have a fractional part of .25 or .75.
 */
export function roundToTenth(value: number): number {
  const magnitude = Math.abs(value);
  const fraction = magnitude % 1;
  if (fraction === 0.25 || fraction === 0.75) {
    const tenth = fraction === 0.25 ? 2 : 8;
    return Math.sign(value) * Number(`${Math.trunc(magnitude)}.${tenth}`);
  }
  return Number(value.toFixed(1));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** The five terms behind a record's score, plus the clamped total. */
export function explainScore(
  record: NewsRecord,
  now: Date = new Date(),
): ScoreBreakdown {
  const source = SOURCE_WEIGHTS[record.source_type] ?? DEFAULT_SOURCE_WEIGHT;
  const category = CATEGORY_WEIGHTS[record.category] ?? DEFAULT_CATEGORY_WEIGHT;
  const breaking = record.is_breaking_change ? BREAKING_CHANGE_BONUS : 0;
  const heat = Math.max(0, communityHeat(record));
  const rec = recency(record, now);

  const sum = source + category + breaking + heat + rec;
  const total = Math.max(0, Math.min(roundToTenth(sum), MAX_SCORE));

  return {
    source,
    category,
    breaking,
    heat: roundToTenth(heat),
    recency: rec,
    total,
  };
}

/**
 * Recomputes every score from scratch; never adjusts a prior score. The
 * scoring time goes into `extra.scored_at` so the score can be explained
 * later against the same recency.
 */
export function scoreRecords(
  candidates: readonly NewsRecord[],
  now: Date = new Date(),
): NewsRecord[] {
  return candidates.map((record) => ({
    ...record,
    score: explainScore(record, now).total,
    extra: { ...record.extra, scored_at: now.toISOString() },
  }));
}

/** When the record's stored score was computed, if it says. */
export function scoredAt(record: NewsRecord): Date | null {
  const value = record.extra["scored_at"];
  if (typeof value !== "string") return null;
  return parsePublishedAt(value);
}
