// =============================================================================
// @trendwire/worker — Ingestion run
// =============================================================================
// One batch: fetch every enabled producer (each isolated), run the scoring
// pipeline, persist, then index the new records. Only a store write failure
// rejects; producer and indexing failures are reported and logged.
// =============================================================================

import {
  errorMessage,
  processRecords,
  type Category,
  type JsonStore,
  type KeywordTable,
  type Logger,
  type NewsRecord,
  type SaveResult,
  type VectorIndex,
} from "@trendwire/shared";
import type { SourceProducer } from "./sources/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface IngestionDeps {
  store: JsonStore;
  producers: readonly SourceProducer[];
  keywordTable: KeywordTable;
  logger: Logger;
  /** Omitted when the caller does not maintain an index */
  vectorIndex?: VectorIndex;
}

export interface IngestionOptions {
  keepDays: number;
  coldStartDays: number;
  forumMinScore: number;
  pinnedCategories?: readonly Category[];
  now?: Date;
}

export interface SourceReport {
  name: string;
  fetched: number;
  error?: string;
}

export interface IngestionReport {
  startedAt: string;
  since: string;
  coldStart: boolean;
  sources: SourceReport[];
  fetched: number;
  processed: number;
  breaking: number;
  saved: SaveResult | null;
  indexed: number;
  indexError?: string;
  durationMs: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

async function fetchWindowStart(
  store: JsonStore,
  coldStartDays: number,
  now: Date,
): Promise<{ since: Date; coldStart: boolean }> {
  const coldWindow = new Date(now.getTime() - coldStartDays * DAY_MS);
  if (await store.isColdStart()) return { since: coldWindow, coldStart: true };

  const lastRun = await store.getLastRunTime();
  return { since: lastRun ?? coldWindow, coldStart: false };
}

export async function runIngestion(
  deps: IngestionDeps,
  options: IngestionOptions,
): Promise<IngestionReport> {
  const { store, producers, keywordTable, logger, vectorIndex } = deps;
  const start = performance.now();
  const now = options.now ?? new Date();

  const { since, coldStart } = await fetchWindowStart(
    store,
    options.coldStartDays,
    now,
  );
  logger.info("Ingestion started", {
    since: since.toISOString(),
    coldStart,
  });

  // 1. Fetch
  const candidates: NewsRecord[] = [];
  const sources: SourceReport[] = [];
  for (const producer of producers) {
    if (!producer.isEnabled()) continue;
    try {
      const records = await producer.fetch(since);
      candidates.push(...records);
      sources.push({ name: producer.name, fetched: records.length });
      logger.info("Source fetched", {
        source: producer.name,
        fetched: records.length,
      });
    } catch (err) {
      const error = errorMessage(err);
      sources.push({ name: producer.name, fetched: 0, error });
      logger.error("Source fetch failed", { source: producer.name, error });
    }
  }

  // 2. Dedupe -> classify -> filter -> score -> rank
  const processed = processRecords(candidates, {
    keywordTable,
    thresholds: { forum_min_score: options.forumMinScore },
    knownUrls: await store.getExistingUrls(),
    pinnedCategories: options.pinnedCategories,
    now,
  });

  // 3. Persist
  await store.updateLastRunTime(now);
  const saved =
    processed.length > 0
      ? await store.save(processed, options.keepDays, now)
      : null;

  // 4. Index
  let indexed = 0;
  let indexError: string | undefined;
  if (vectorIndex && processed.length > 0) {
    try {
      indexed = await vectorIndex.add(processed);
    } catch (err) {
      indexError = errorMessage(err);
      logger.error("Indexing failed", { error: indexError });
    }
  }

  const report: IngestionReport = {
    startedAt: now.toISOString(),
    since: since.toISOString(),
    coldStart,
    sources,
    fetched: candidates.length,
    processed: processed.length,
    breaking: processed.filter((r) => r.is_breaking_change).length,
    saved,
    indexed,
    ...(indexError !== undefined && { indexError }),
    durationMs: Math.round(performance.now() - start),
  };

  logger.info("Ingestion completed", {
    fetched: report.fetched,
    processed: report.processed,
    breaking: report.breaking,
    indexed,
    durationMs: report.durationMs,
  });
  return report;
}

// ---------------------------------------------------------------------------
// In-process single-flight guard
// ---------------------------------------------------------------------------

export class IngestionInProgressError extends Error {
  constructor() {
    super("An ingestion run is already in progress");
    this.name = "IngestionInProgressError";
  }
}

export interface IngestionGuard {
  readonly running: boolean;
  /** Rejects with IngestionInProgressError while another run is active. */
  run<T>(job: () => Promise<T>): Promise<T>;
}

export function createIngestionGuard(): IngestionGuard {
  let running = false;
  return {
    get running() {
      return running;
    },
    async run<T>(job: () => Promise<T>): Promise<T> {
      if (running) throw new IngestionInProgressError();
      running = true;
      try {
        return await job();
      } finally {
        running = false;
      }
    },
  };
}
