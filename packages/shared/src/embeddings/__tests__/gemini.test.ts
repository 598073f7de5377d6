import { describe, it, expect, vi } from "vitest";
import { ApiError } from "@google/genai";
import {
  createGeminiEmbeddingService,
  embeddingHealthCheck,
  isRetryable,
  withRetry,
  type EmbedContentApi,
  type EmbeddingClient,
} from "../gemini.js";

const NO_DELAY = { maxRetries: 2, initialDelayMs: 0, backoffFactor: 2 };

function makeClient(embedContent: EmbedContentApi["embedContent"]): EmbeddingClient {
  return {
    models: { embedContent },
    model: "test-embedding",
    dimensions: 3,
    retry: NO_DELAY,
  };
}

describe("isRetryable", () => {
  it("retries rate limits and server errors", () => {
    expect(isRetryable(new ApiError({ message: "slow down", status: 429 }))).toBe(true);
    expect(isRetryable(new ApiError({ message: "unavailable", status: 503 }))).toBe(true);
    expect(isRetryable({ status: 500 })).toBe(true);
    expect(isRetryable(new Error("got 502 from upstream"))).toBe(true);
  });

  it("does not retry client errors", () => {
    expect(isRetryable(new ApiError({ message: "bad key", status: 401 }))).toBe(false);
    expect(isRetryable(new Error("invalid argument"))).toBe(false);
    expect(isRetryable("boom")).toBe(false);
  });
});

describe("withRetry", () => {
  it("gives up after maxRetries further attempts", async () => {
    const fn = vi.fn(async () => {
      throw new ApiError({ message: "busy", status: 429 });
    });
    await expect(withRetry(fn, NO_DELAY)).rejects.toThrow("busy");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("stops at the first non-retryable error", async () => {
    const fn = vi.fn(async () => {
      throw new Error("invalid argument");
    });
    await expect(withRetry(fn, NO_DELAY)).rejects.toThrow("invalid argument");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("createGeminiEmbeddingService", () => {
  it("maps the embedding kind to a task type", async () => {
    const embedContent = vi.fn(async () => ({ embeddings: [{ values: [0.1, 0.2, 0.3] }] }));
    const service = createGeminiEmbeddingService(makeClient(embedContent));

    expect(await service.embed("agents", "query")).toEqual([0.1, 0.2, 0.3]);
    await service.embed("agents", "document");

    expect(embedContent).toHaveBeenNthCalledWith(1, {
      model: "test-embedding",
      contents: "agents",
      config: { outputDimensionality: 3, taskType: "RETRIEVAL_QUERY" },
    });
    expect(embedContent).toHaveBeenNthCalledWith(2, {
      model: "test-embedding",
      contents: "agents",
      config: { outputDimensionality: 3, taskType: "RETRIEVAL_DOCUMENT" },
    });
  });

  it("recovers from a transient failure", async () => {
    const embedContent = vi
      .fn<EmbedContentApi["embedContent"]>()
      .mockRejectedValueOnce(new ApiError({ message: "busy", status: 429 }))
      .mockResolvedValueOnce({ embeddings: [{ values: [1, 0, 0] }] });
    const service = createGeminiEmbeddingService(makeClient(embedContent));

    expect(await service.embed("retry me", "document")).toEqual([1, 0, 0]);
    expect(embedContent).toHaveBeenCalledTimes(2);
  });

  it("rejects a response without values", async () => {
    const service = createGeminiEmbeddingService(
      makeClient(vi.fn(async () => ({ embeddings: [] }))),
    );
    await expect(service.embed("empty", "query")).rejects.toThrow(
      "Embedding response missing values",
    );
  });
});

describe("embeddingHealthCheck", () => {
  it("reports failure after a single attempt", async () => {
    const embedContent = vi.fn(async () => {
      throw new ApiError({ message: "busy", status: 429 });
    });
    const result = await embeddingHealthCheck(makeClient(embedContent));

    expect(result.ok).toBe(false);
    expect(result.error).toBe("busy");
    expect(embedContent).toHaveBeenCalledTimes(1);
  });

  it("reports success", async () => {
    const result = await embeddingHealthCheck(
      makeClient(vi.fn(async () => ({ embeddings: [{ values: [1] }] }))),
    );
    expect(result.ok).toBe(true);
    expect(result.error).toBeUndefined();
  });
});
