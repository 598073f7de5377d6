// =============================================================================
// @trendwire/shared — Incremental vector index over NewsRecords
// =============================================================================
// Identity is sha256(normalizeUrl(url)), so re-adding a record is a no-op.
// Each record is embedded as `title + "\n" + content`. A failed embedding
// skips that record only; a failed query embedding yields no hits.
// =============================================================================

import { createHash } from "node:crypto";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { normalizeUrl } from "../pipeline/deduplicator.js";
import type { EmbeddingService } from "../services.js";
import type { NewsRecord, SearchHit } from "../types.js";
import type { VectorBackend, VectorEntry } from "./backend.js";

export function recordId(url: string): string {
  return createHash("sha256").update(normalizeUrl(url)).digest("hex");
}

export function embeddingText(record: NewsRecord): string {
  return `${record.title}\n${record.content}`;
}

export class VectorIndex {
  constructor(
    private readonly backend: VectorBackend,
    private readonly embedder: EmbeddingService,
    private readonly logger: Logger,
  ) {}

  /** Indexes records not yet present; returns how many were inserted. */
  async add(records: readonly NewsRecord[]): Promise<number> {
    const known = await this.backend.listIds();
    const entries: VectorEntry[] = [];

    for (const record of records) {
      const id = recordId(record.url);
      if (known.has(id)) continue;
      known.add(id);

      let vector: number[];
      try {
        vector = await this.embedder.embed(embeddingText(record), "document");
      } catch (err) {
        this.logger.warn("Embedding failed, skipping record", {
          url: record.url,
          error: errorMessage(err),
        });
        continue;
      }

      entries.push({
        id,
        vector,
        content: record.content,
        metadata: {
          title: record.title,
          url: record.url,
          source: record.source,
          category: record.category,
          published_at: record.published_at,
          score: record.score,
        },
      });
    }

    await this.backend.insert(entries);
    this.logger.info("Vector index updated", {
      added: entries.length,
      offered: records.length,
    });
    return entries.length;
  }

  /** Up to min(topK, count()) hits, most similar first. */
  async search(query: string, topK: number): Promise<SearchHit[]> {
    if (topK <= 0 || (await this.backend.count()) === 0) return [];

    let vector: number[];
    try {
      vector = await this.embedder.embed(query, "query");
    } catch (err) {
      this.logger.warn("Query embedding failed", { error: errorMessage(err) });
      return [];
    }

    const matches = await this.backend.query(vector, topK);
    return matches.map((m) => ({
      ...m.metadata,
      content: m.content,
      similarity: m.similarity,
    }));
  }

  async count(): Promise<number> {
    return this.backend.count();
  }
}
