// =============================================================================
// @trendwire/shared — Neo4j vector backend
// =============================================================================
// Stores each projection as an :IndexedRecord node keyed by `id`, with the
// embedding on `n.embedding`, searched through the `record_embedding`
// cosine vector index. Inserts use MERGE so a repeated add is a no-op.
// =============================================================================

import neo4j, { type Driver } from "neo4j-driver";
import { z } from "zod";
import type { Logger } from "../logger.js";
import {
  IndexedMetadataSchema,
  type VectorBackend,
  type VectorEntry,
  type VectorMatch,
} from "./backend.js";

export const RECORD_VECTOR_INDEX = {
  name: "record_embedding",
  label: "IndexedRecord",
  property: "embedding",
  similarityFunction: "cosine",
} as const;

// ---------------------------------------------------------------------------
// Row schemas
// ---------------------------------------------------------------------------

const IdRowSchema = z.object({ id: z.string() });

const MatchRowSchema = z.object({
  metadata: IndexedMetadataSchema,
  content: z.string().nullable(),
  similarity: z.number(),
});

function toNumber(value: unknown): number {
  if (neo4j.isInt(value)) return value.toNumber();
  return typeof value === "number" ? value : 0;
}

// ---------------------------------------------------------------------------
// Schema setup
// ---------------------------------------------------------------------------

/** Creates the uniqueness constraint and vector index if they are missing. */
export async function ensureVectorIndex(
  driver: Driver,
  dimensions: number,
  logger: Logger,
): Promise<void> {
  const session = driver.session();
  try {
    await session.executeWrite(async (tx) => {
      await tx.run(
        `CREATE CONSTRAINT indexed_record_id IF NOT EXISTS
         FOR (n:${RECORD_VECTOR_INDEX.label}) REQUIRE n.id IS UNIQUE`,
      );
    });
    await session.executeWrite(async (tx) => {
      await tx.run(
        `CREATE VECTOR INDEX ${RECORD_VECTOR_INDEX.name} IF NOT EXISTS
         FOR (n:${RECORD_VECTOR_INDEX.label}) ON (n.${RECORD_VECTOR_INDEX.property})
         OPTIONS { indexConfig: {
           \`vector.dimensions\`: $dimensions,
           \`vector.similarity_function\`: $similarityFunction
         }}`,
        {
          dimensions: neo4j.int(dimensions),
          similarityFunction: RECORD_VECTOR_INDEX.similarityFunction,
        },
      );
    });
    logger.info("Vector index ensured", {
      index: RECORD_VECTOR_INDEX.name,
      dimensions,
    });
  } finally {
    await session.close();
  }
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export class Neo4jVectorBackend implements VectorBackend {
  constructor(private readonly driver: Driver) {}

  async listIds(): Promise<Set<string>> {
    const session = this.driver.session();
    try {
      const result = await session.executeRead(async (tx) =>
        tx.run(`MATCH (n:${RECORD_VECTOR_INDEX.label}) RETURN n.id AS id`),
      );
      return new Set(
        result.records.map((r) => IdRowSchema.parse(r.toObject()).id),
      );
    } finally {
      await session.close();
    }
  }

  async insert(entries: readonly VectorEntry[]): Promise<void> {
    if (entries.length === 0) return;

    const rows = entries.map((e) => ({
      id: e.id,
      embedding: e.vector,
      content: e.content,
      ...e.metadata,
    }));

    const session = this.driver.session();
    try {
      await session.executeWrite(async (tx) => {
        await tx.run(
          `UNWIND $rows AS row
           MERGE (n:${RECORD_VECTOR_INDEX.label} {id: row.id})
           ON CREATE SET
             n.title = row.title,
             n.url = row.url,
             n.source = row.source,
             n.category = row.category,
             n.published_at = row.published_at,
             n.score = row.score,
             n.content = row.content,
             n.${RECORD_VECTOR_INDEX.property} = row.embedding,
             n.indexed_at = datetime()`,
          { rows },
        );
      });
    } finally {
      await session.close();
    }
  }

  async query(vector: readonly number[], topK: number): Promise<VectorMatch[]> {
    const session = this.driver.session();
    try {
      const result = await session.executeRead(async (tx) =>
        tx.run(
          `CALL db.index.vector.queryNodes('${RECORD_VECTOR_INDEX.name}', $topK, $vector)
           YIELD node, score
           RETURN {
             title: node.title,
             url: node.url,
             source: node.source,
             category: node.category,
             published_at: node.published_at,
             score: node.score
           } AS metadata,
           node.content AS content,
           score AS similarity
           ORDER BY similarity DESC`,
          { topK: neo4j.int(topK), vector: [...vector] },
        ),
      );

      return result.records.map((r) => {
        const row = MatchRowSchema.parse(r.toObject());
        return {
          metadata: row.metadata,
          content: row.content ?? "",
          similarity: row.similarity,
        };
      });
    } finally {
      await session.close();
    }
  }

  async count(): Promise<number> {
    const session = this.driver.session();
    try {
      const result = await session.executeRead(async (tx) =>
        tx.run(
          `MATCH (n:${RECORD_VECTOR_INDEX.label}) RETURN count(n) AS total`,
        ),
      );
      const first = result.records[0];
      return first ? toNumber(first.get("total")) : 0;
    } finally {
      await session.close();
    }
  }
}
