// =============================================================================
// @trendwire/shared — Single-file vector backend
// =============================================================================
// One JSON file holds every entry. Each operation reads the file afresh, so
// a long-lived server sees what a CLI run wrote in between; an insert
// merges into the current file contents and replaces the file atomically.
// Search is brute-force cosine similarity over a rolling window of records.
// =============================================================================

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  IndexedMetadataSchema,
  type VectorBackend,
  type VectorEntry,
  type VectorMatch,
} from "./backend.js";
import { cosineSimilarity } from "./similarity.js";

const VectorEntrySchema: z.ZodType<VectorEntry, z.ZodTypeDef, unknown> =
  z.object({
    id: z.string().min(1),
    vector: z.array(z.number()).min(1),
    metadata: IndexedMetadataSchema,
    content: z.string(),
  });

const IndexFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(z.unknown()),
});

export class FileVectorBackend implements VectorBackend {
  constructor(
    readonly path: string,
    private readonly logger: Logger,
  ) {}

  async listIds(): Promise<Set<string>> {
    const entries = await this.load();
    return new Set(entries.keys());
  }

  async insert(newEntries: readonly VectorEntry[]): Promise<void> {
    if (newEntries.length === 0) return;
    const entries = new Map(await this.load());
    for (const entry of newEntries) entries.set(entry.id, entry);
    await this.persist(entries);
  }

  async query(vector: readonly number[], topK: number): Promise<VectorMatch[]> {
    const entries = await this.load();
    return [...entries.values()]
      .map((entry) => ({
        metadata: entry.metadata,
        content: entry.content,
        similarity: cosineSimilarity(vector, entry.vector),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, Math.max(0, topK));
  }

  async count(): Promise<number> {
    return (await this.load()).size;
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  private async load(): Promise<Map<string, VectorEntry>> {
    const entries = new Map<string, VectorEntry>();

    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
        this.logger.warn("Failed to read vector index, starting empty", {
          path: this.path,
          error: errorMessage(err),
        });
      }
      return entries;
    }

    let file: z.infer<typeof IndexFileSchema>;
    try {
      file = IndexFileSchema.parse(JSON.parse(text));
    } catch (err) {
      this.logger.warn("Vector index file is malformed, starting empty", {
        path: this.path,
        error: errorMessage(err),
      });
      return entries;
    }

    for (const raw of file.entries) {
      const parsed = VectorEntrySchema.safeParse(raw);
      if (parsed.success) {
        entries.set(parsed.data.id, parsed.data);
      } else {
        this.logger.warn("Skipping invalid vector index entry", {
          path: this.path,
          error: parsed.error.message,
        });
      }
    }
    return entries;
  }

  private async persist(entries: Map<string, VectorEntry>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    const payload = { version: 1, entries: [...entries.values()] };
    await writeFile(tmp, JSON.stringify(payload), "utf8");
    await rename(tmp, this.path);
  }
}
