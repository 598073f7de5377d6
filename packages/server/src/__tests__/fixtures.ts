// =============================================================================
// Shared fixtures for server tests: in-process dependencies, no network
// =============================================================================

import { vi } from "vitest";
import {
  JsonStore,
  RetrievalAnswerer,
  TrendDigest,
  VectorIndex,
  createLogger,
  loadServerConfig,
  type CompletionService,
  type EmbedContentApi,
  type EmbeddingClient,
  type Logger,
  type VectorBackend,
  type VectorEntry,
  type VectorMatch,
} from "@trendwire/shared";
import { createIngestionGuard, type IngestionReport } from "@trendwire/worker";
import type { AppDependencies } from "../server.js";

export class MemoryBackend implements VectorBackend {
  readonly entries: VectorEntry[] = [];

  async listIds() {
    return new Set(this.entries.map((e) => e.id));
  }
  async insert(entries: readonly VectorEntry[]) {
    this.entries.push(...entries);
  }
  async query(_vector: readonly number[], topK: number): Promise<VectorMatch[]> {
    return this.entries
      .slice(0, topK)
      .map((e) => ({ metadata: e.metadata, content: e.content, similarity: 1 }));
  }
  async count() {
    return this.entries.length;
  }
}

export interface LoggedLine {
  level: string;
  msg: string;
  [key: string]: unknown;
}

export function createCapturingLogger(): {
  logger: Logger;
  lines: LoggedLine[];
  messages(level: string): string[];
} {
  const lines: LoggedLine[] = [];
  const logger = createLogger({
    level: "trace",
    sink: {
      write(chunk: string) {
        const parsed: unknown = JSON.parse(chunk);
        if (
          typeof parsed === "object" &&
          parsed !== null &&
          "level" in parsed &&
          "msg" in parsed &&
          typeof parsed.level === "string" &&
          typeof parsed.msg === "string"
        ) {
          lines.push({ ...parsed, level: parsed.level, msg: parsed.msg });
        }
        return true;
      },
    },
  });
  return {
    logger,
    lines,
    messages: (level) => lines.filter((l) => l.level === level).map((l) => l.msg),
  };
}

export function createEmbeddingClientStub(
  embedContent: EmbedContentApi["embedContent"] = async () => ({
    embeddings: [{ values: [1, 0] }],
  }),
): EmbeddingClient {
  return {
    models: { embedContent },
    model: "test-embedding",
    dimensions: 2,
    retry: { maxRetries: 0, initialDelayMs: 0, backoffFactor: 2 },
  };
}

const completion: CompletionService = {
  complete: async () => "Stub answer.",
  stream: async (_request, onText) => {
    onText("Stub answer.");
    return "Stub answer.";
  },
};

export const emptyReport: IngestionReport = {
  startedAt: "2025-06-10T12:00:00.000Z",
  since: "2025-06-03T12:00:00.000Z",
  coldStart: true,
  sources: [],
  fetched: 0,
  processed: 0,
  breaking: 0,
  saved: null,
  indexed: 0,
  durationMs: 5,
};

export function createTestDeps(
  dataDir: string,
  overrides: Partial<AppDependencies> & { env?: Record<string, string> } = {},
): AppDependencies {
  const { env = {}, ...rest } = overrides;
  const logger = rest.logger ?? createCapturingLogger().logger;
  const store = new JsonStore(dataDir, logger);
  const vectorIndex = new VectorIndex(
    new MemoryBackend(),
    { embed: async () => [1, 0] },
    logger,
  );
  return {
    config: loadServerConfig({
      GEMINI_API_KEY: "test-secret",
      ANTHROPIC_API_KEY: "test-secret",
      API_KEYS: '{"test-key": "test-client"}',
      DATA_DIR: dataDir,
      ...env,
    }),
    logger,
    store,
    vectorIndex,
    answerer: new RetrievalAnswerer(vectorIndex, completion, logger),
    digest: new TrendDigest(store, completion, logger),
    embeddingClient: createEmbeddingClientStub(),
    ingest: vi.fn(async () => emptyReport),
    ingestionGuard: createIngestionGuard(),
    ...rest,
  };
}
