// =============================================================================
// @trendwire/shared — Gemini embeddings
// =============================================================================
// Document and query embeddings through @google/genai with task-type hints.
// Rate-limit and server errors are retried with exponential backoff; the
// vector index decides what to do when retries run out.
// =============================================================================

import { ApiError, GoogleGenAI } from "@google/genai";
import type {
  EmbeddingKind,
  EmbeddingService,
  HealthCheckResult,
} from "../services.js";

export type TaskType = "RETRIEVAL_DOCUMENT" | "RETRIEVAL_QUERY";

/** The one SDK call this module makes, so tests can supply a fake. */
export type EmbedContentApi = Pick<GoogleGenAI["models"], "embedContent">;

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
}

export interface EmbeddingClient {
  models: EmbedContentApi;
  model: string;
  dimensions: number;
  retry: RetryPolicy;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
};

const TASK_TYPES: Record<EmbeddingKind, TaskType> = {
  document: "RETRIEVAL_DOCUMENT",
  query: "RETRIEVAL_QUERY",
};

// ---------------------------------------------------------------------------
// Retry
// ---------------------------------------------------------------------------

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof ApiError) return isRetryableStatus(error.status);
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return isRetryableStatus(error.status);
  }
  if (error instanceof Error) {
    return /\b(429|5\d\d)\b|rate limit/i.test(error.message);
  }
  return false;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= policy.maxRetries || !isRetryable(error)) throw error;
      const delay = policy.initialDelayMs * policy.backoffFactor ** attempt;
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export function createEmbeddingClient(
  apiKey: string,
  options: { model?: string; dimensions?: number; retry?: RetryPolicy } = {},
): EmbeddingClient {
  return {
    models: new GoogleGenAI({ apiKey }).models,
    model: options.model ?? "gemini-embedding-001",
    dimensions: options.dimensions ?? 768,
    retry: options.retry ?? DEFAULT_RETRY_POLICY,
  };
}

export async function embedText(
  client: EmbeddingClient,
  text: string,
  taskType: TaskType,
): Promise<number[]> {
  const response = await withRetry(
    () =>
      client.models.embedContent({
        model: client.model,
        contents: text,
        config: { outputDimensionality: client.dimensions, taskType },
      }),
    client.retry,
  );

  const values = response.embeddings?.[0]?.values;
  if (!values || values.length === 0) {
    throw new Error("Embedding response missing values");
  }
  return values;
}

export function createGeminiEmbeddingService(
  client: EmbeddingClient,
): EmbeddingService {
  return {
    embed: (text, kind) => embedText(client, text, TASK_TYPES[kind]),
  };
}

/** One query embedding, without retries. */
export async function embeddingHealthCheck(
  client: EmbeddingClient,
): Promise<HealthCheckResult> {
  const start = performance.now();
  try {
    await embedText(
      { ...client, retry: { ...client.retry, maxRetries: 0 } },
      "health check",
      "RETRIEVAL_QUERY",
    );
    return { ok: true, latencyMs: performance.now() - start };
  } catch (error) {
    return {
      ok: false,
      latencyMs: performance.now() - start,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
