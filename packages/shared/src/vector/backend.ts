import { z } from "zod";
import { CATEGORIES, type IndexedMetadata } from "../types.js";

/** One indexed projection: embedding plus what search hands back. */
export interface VectorEntry {
  id: string;
  vector: number[];
  metadata: IndexedMetadata;
  content: string;
}

export interface VectorMatch {
  metadata: IndexedMetadata;
  content: string;
  similarity: number;
}

/**
 * Persistence for the vector index. Implementations own their storage and
 * similarity search; identity and embedding live in VectorIndex.
 */
export interface VectorBackend {
  listIds(): Promise<Set<string>>;
  insert(entries: readonly VectorEntry[]): Promise<void>;
  /** Up to `topK` matches, most similar first. */
  query(vector: readonly number[], topK: number): Promise<VectorMatch[]>;
  count(): Promise<number>;
}

export const IndexedMetadataSchema: z.ZodType<
  IndexedMetadata,
  z.ZodTypeDef,
  unknown
> = z.object({
  title: z.string(),
  url: z.string(),
  source: z.string(),
  category: z.enum(CATEGORIES),
  published_at: z.string(),
  score: z.number(),
});
