// =============================================================================
// @trendwire/worker — Component wiring
// =============================================================================
// Builds every long-lived component from a validated Config. Shared by the
// CLI and the server so both run the exact same pipeline.
// =============================================================================

import { join } from "node:path";
import {
  FileVectorBackend,
  JsonStore,
  Neo4jVectorBackend,
  RetrievalAnswerer,
  TrendDigest,
  VectorIndex,
  closeDriver,
  createAnthropicClient,
  createAnthropicCompletionService,
  createDriver,
  createEmbeddingClient,
  createGeminiEmbeddingService,
  ensureVectorIndex,
  loadKeywordTable,
  neo4jConnectionFromConfig,
  type Config,
  type Driver,
  type EmbeddingClient,
  type KeywordTable,
  type Logger,
  type VectorBackend,
} from "@trendwire/shared";
import type { IngestionDeps, IngestionOptions } from "./ingest.js";
import { createProducers, loadSourcesConfig } from "./sources/index.js";
import type { FetchFn, SourceProducer } from "./sources/types.js";

export interface Runtime {
  config: Config;
  logger: Logger;
  store: JsonStore;
  vectorIndex: VectorIndex;
  answerer: RetrievalAnswerer;
  digest: TrendDigest;
  producers: SourceProducer[];
  keywordTable: KeywordTable;
  embeddingClient: EmbeddingClient;
  /** Present only with VECTOR_BACKEND=neo4j */
  driver?: Driver;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  fetchFn?: FetchFn;
}

export function vectorIndexPath(config: Pick<Config, "DATA_DIR">): string {
  return join(config.DATA_DIR, "vector-index.json");
}

export async function createRuntime(
  config: Config,
  logger: Logger,
  options: RuntimeOptions = {},
): Promise<Runtime> {
  const keywordTable = await loadKeywordTable(config.KEYWORDS_FILE);
  const sources = await loadSourcesConfig(config.SOURCES_FILE);

  const embeddingClient = createEmbeddingClient(config.GEMINI_API_KEY, {
    model: config.EMBEDDING_MODEL,
    dimensions: config.EMBEDDING_DIMENSIONS,
  });

  let driver: Driver | undefined;
  let backend: VectorBackend;
  if (config.VECTOR_BACKEND === "neo4j") {
    driver = createDriver(neo4jConnectionFromConfig(config));
    await ensureVectorIndex(driver, config.EMBEDDING_DIMENSIONS, logger);
    backend = new Neo4jVectorBackend(driver);
  } else {
    backend = new FileVectorBackend(
      vectorIndexPath(config),
      logger.child({ component: "vector-index" }),
    );
  }

  const store = new JsonStore(
    config.DATA_DIR,
    logger.child({ component: "store" }),
  );
  const vectorIndex = new VectorIndex(
    backend,
    createGeminiEmbeddingService(embeddingClient),
    logger.child({ component: "vector-index" }),
  );
  const completion = createAnthropicCompletionService(
    createAnthropicClient(config.ANTHROPIC_API_KEY),
    {
      model: config.ANTHROPIC_MODEL,
      maxTokens: config.ANSWER_MAX_TOKENS,
    },
  );
  const answerer = new RetrievalAnswerer(
    vectorIndex,
    completion,
    logger.child({ component: "answerer" }),
    { topK: config.RAG_TOP_K },
  );
  const digest = new TrendDigest(
    store,
    completion,
    logger.child({ component: "digest" }),
  );
  const producers = createProducers(sources, config, {
    logger,
    fetchFn: options.fetchFn,
  });

  return {
    config,
    logger,
    store,
    vectorIndex,
    answerer,
    digest,
    producers,
    keywordTable,
    embeddingClient,
    driver,
    async close() {
      if (driver) await closeDriver(driver);
    },
  };
}

export function ingestionDeps(runtime: Runtime): IngestionDeps {
  return {
    store: runtime.store,
    producers: runtime.producers,
    keywordTable: runtime.keywordTable,
    logger: runtime.logger.child({ component: "ingest" }),
    vectorIndex: runtime.vectorIndex,
  };
}

export function ingestionOptions(config: Config): IngestionOptions {
  return {
    keepDays: config.KEEP_DAYS,
    coldStartDays: config.COLD_START_DAYS,
    forumMinScore: config.FORUM_MIN_SCORE,
    pinnedCategories: config.PINNED_CATEGORIES,
  };
}
