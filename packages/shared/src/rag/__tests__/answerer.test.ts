import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  CONNECTION_FAILED_MESSAGE,
  EMPTY_QUESTION_MESSAGE,
  NO_DATA_MESSAGE,
  RetrievalAnswerer,
  buildPrompt,
  formatExcerpt,
} from "../answerer.js";
import { CompletionConnectionError } from "../../errors.js";
import type {
  CompletionRequest,
  CompletionService,
  EmbeddingService,
} from "../../services.js";
import type { SearchHit } from "../../types.js";
import type {
  VectorBackend,
  VectorEntry,
  VectorMatch,
} from "../../vector/backend.js";
import { VectorIndex } from "../../vector/vector-index.js";
import { createCapturingLogger } from "../../__tests__/helpers.js";

// ---------------------------------------------------------------------------
// In-process fakes
// ---------------------------------------------------------------------------

class MemoryBackend implements VectorBackend {
  readonly entries: VectorEntry[] = [];
  failQueries = false;

  async listIds() {
    return new Set(this.entries.map((e) => e.id));
  }
  async insert(entries: readonly VectorEntry[]) {
    this.entries.push(...entries);
  }
  async query(_vector: readonly number[], topK: number): Promise<VectorMatch[]> {
    if (this.failQueries) throw new Error("index offline");
    return this.entries.slice(0, topK).map((e, i) => ({
      metadata: e.metadata,
      content: e.content,
      similarity: 1 - i / 10,
    }));
  }
  async count() {
    return this.entries.length;
  }
}

const embedder: EmbeddingService = { embed: async () => [1, 0] };

function createFakeCompletion() {
  const complete = vi.fn(
    async (_request: CompletionRequest): Promise<string> => "An answer [1].",
  );
  const stream = vi.fn(
    async (
      _request: CompletionRequest,
      onText: (delta: string) => void,
    ): Promise<string> => {
      onText("An answer ");
      onText("[1].");
      return "An answer [1].";
    },
  );
  const service: CompletionService = { complete, stream };
  return { service, complete, stream };
}

const hit: SearchHit = {
  title: "Alpha release",
  url: "https://example.com/alpha",
  source: "Example Feed",
  category: "llm",
  published_at: "2025-06-01T10:00:00.000Z",
  score: 70,
  content: "alpha notes",
  similarity: 0.9,
};

function entryFor(h: SearchHit): VectorEntry {
  return {
    id: h.url,
    vector: [1, 0],
    content: h.content,
    metadata: {
      title: h.title,
      url: h.url,
      source: h.source,
      category: h.category,
      published_at: h.published_at,
      score: h.score,
    },
  };
}

// ---------------------------------------------------------------------------
// Prompt building
// ---------------------------------------------------------------------------

describe("formatExcerpt", () => {
  it("numbers the excerpt and shows category, source and date", () => {
    expect(formatExcerpt(hit, 1)).toBe(
      "[1] [llm] Alpha release (source: Example Feed, date: 2025-06-01)\n    alpha notes",
    );
  });

  it("truncates long content to 500 characters", () => {
    const excerpt = formatExcerpt({ ...hit, content: "x".repeat(800) }, 2);
    expect(excerpt.split("\n    ")[1]).toHaveLength(500);
  });
});

describe("buildPrompt", () => {
  it("puts the excerpts before the question", () => {
    const request = buildPrompt("What shipped?", [
      hit,
      { ...hit, title: "Beta launch", category: "agent" },
    ]);
    expect(request.user).toBe(
      "Retrieved excerpts:\n" +
        "[1] [llm] Alpha release (source: Example Feed, date: 2025-06-01)\n    alpha notes\n\n" +
        "[2] [agent] Beta launch (source: Example Feed, date: 2025-06-01)\n    alpha notes\n\n" +
        "Question: What shipped?",
    );
    expect(request.system).toContain("cite excerpt numbers");
  });
});

// ---------------------------------------------------------------------------
// RetrievalAnswerer
// ---------------------------------------------------------------------------

describe("RetrievalAnswerer", () => {
  let backend: MemoryBackend;
  let completion: ReturnType<typeof createFakeCompletion>;
  let answerer: RetrievalAnswerer;

  beforeEach(() => {
    const log = createCapturingLogger();
    backend = new MemoryBackend();
    completion = createFakeCompletion();
    answerer = new RetrievalAnswerer(
      new VectorIndex(backend, embedder, log.logger),
      completion.service,
      log.logger,
      { topK: 3 },
    );
  });

  it("answers from retrieved excerpts", async () => {
    backend.entries.push(entryFor(hit));

    expect(await answerer.ask("  What shipped?  ")).toBe("An answer [1].");
    const request = completion.complete.mock.calls[0]?.[0];
    expect(request?.user).toContain("Question: What shipped?");
    expect(request?.user).toContain("[1] [llm] Alpha release");
  });

  it("rejects a blank question without calling any service", async () => {
    backend.entries.push(entryFor(hit));
    expect(await answerer.ask("   ")).toBe(EMPTY_QUESTION_MESSAGE);
    expect(completion.complete).not.toHaveBeenCalled();
  });

  it("reports an empty index", async () => {
    expect(await answerer.ask("What shipped?")).toBe(NO_DATA_MESSAGE);
    expect(completion.complete).not.toHaveBeenCalled();
  });

  it("maps connection failures to the connectivity message", async () => {
    backend.entries.push(entryFor(hit));
    completion.complete.mockRejectedValueOnce(
      new CompletionConnectionError("ECONNREFUSED"),
    );
    expect(await answerer.ask("What shipped?")).toBe(CONNECTION_FAILED_MESSAGE);
  });

  it("reports other generation failures with their message", async () => {
    backend.entries.push(entryFor(hit));
    completion.complete.mockRejectedValueOnce(new Error("overloaded"));
    expect(await answerer.ask("What shipped?")).toBe(
      "Failed to generate answer: overloaded",
    );
  });

  it("reports retrieval failures without calling the completion service", async () => {
    backend.entries.push(entryFor(hit));
    backend.failQueries = true;
    expect(await answerer.ask("What shipped?")).toBe(
      "Failed to generate answer: index offline",
    );
    expect(completion.complete).not.toHaveBeenCalled();
  });

  describe("askStream", () => {
    it("forwards deltas and returns the full text", async () => {
      backend.entries.push(entryFor(hit));
      const chunks: string[] = [];

      const text = await answerer.askStream("What shipped?", (c) =>
        chunks.push(c),
      );

      expect(chunks).toEqual(["An answer ", "[1]."]);
      expect(text).toBe("An answer [1].");
    });

    it("delivers a degraded outcome as one chunk", async () => {
      const chunks: string[] = [];
      const text = await answerer.askStream("What shipped?", (c) =>
        chunks.push(c),
      );
      expect(chunks).toEqual([NO_DATA_MESSAGE]);
      expect(text).toBe(NO_DATA_MESSAGE);
    });

    it("appends the failure on a new line when the stream breaks midway", async () => {
      backend.entries.push(entryFor(hit));
      completion.stream.mockImplementationOnce(async (_request, onText) => {
        onText("Partial");
        throw new CompletionConnectionError("socket hang up");
      });
      const chunks: string[] = [];

      const text = await answerer.askStream("What shipped?", (c) =>
        chunks.push(c),
      );

      expect(chunks).toEqual(["Partial", `\n${CONNECTION_FAILED_MESSAGE}`]);
      expect(text).toBe(CONNECTION_FAILED_MESSAGE);
    });
  });
});
