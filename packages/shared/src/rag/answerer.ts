// =============================================================================
// @trendwire/shared — Retrieval-augmented answerer
// =============================================================================
// question -> top-k hits from the VectorIndex -> numbered excerpts -> one
// completion call. Never throws: every failure becomes a user-facing
// message. No retries.
// =============================================================================

import { CompletionConnectionError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CompletionRequest, CompletionService } from "../services.js";
import type { SearchHit } from "../types.js";
import type { VectorIndex } from "../vector/vector-index.js";

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export const EMPTY_QUESTION_MESSAGE = "Please enter a question.";
export const NO_DATA_MESSAGE =
  "No indexed data found. Run ingestion first to build the index.";
export const CONNECTION_FAILED_MESSAGE =
  "Cannot reach the completion service. Check your network connection and API configuration.";

export function generationFailedMessage(err: unknown): string {
  return `Failed to generate answer: ${errorMessage(err)}`;
}

/** Logs a failed completion call and returns the message the user sees. */
export function completionFailureMessage(err: unknown, logger: Logger): string {
  if (err instanceof CompletionConnectionError) {
    logger.warn("Completion service unreachable", { error: err.message });
    return CONNECTION_FAILED_MESSAGE;
  }
  logger.error("Answer generation failed", { error: errorMessage(err) });
  return generationFailedMessage(err);
}

export const EXCERPT_MAX_CHARS = 500;
export const DEFAULT_TOP_K = 5;

const SYSTEM_PROMPT = [
  "You are an analyst of AI technology trends.",
  "Answer the user's question strictly from the numbered excerpts retrieved from the knowledge base; do not add facts that are not in them.",
  "Reply in the same language as the question, keep the structure clear, and cite excerpt numbers such as [1] whenever you use a specific piece of information.",
  "If the excerpts are unrelated to the question or insufficient to answer it, say so plainly.",
].join(" ");

// ---------------------------------------------------------------------------
// Prompt building
// ---------------------------------------------------------------------------

/** `[n] [category] title (source: S, date: YYYY-MM-DD)` + indented content */
export function formatExcerpt(hit: SearchHit, position: number): string {
  const date = hit.published_at.slice(0, 10);
  return (
    `[${position}] [${hit.category}] ${hit.title} (source: ${hit.source}, date: ${date})\n` +
    `    ${hit.content.slice(0, EXCERPT_MAX_CHARS)}`
  );
}

export function buildPrompt(
  question: string,
  hits: readonly SearchHit[],
): CompletionRequest {
  const context = hits.map((hit, i) => formatExcerpt(hit, i + 1)).join("\n\n");
  return {
    system: SYSTEM_PROMPT,
    user: `Retrieved excerpts:\n${context}\n\nQuestion: ${question}`,
  };
}

// ---------------------------------------------------------------------------
// Answerer
// ---------------------------------------------------------------------------

export interface AnswererOptions {
  topK?: number;
}

type Retrieval =
  | { kind: "ready"; request: CompletionRequest }
  | { kind: "answered"; text: string };

export class RetrievalAnswerer {
  private readonly topK: number;

  constructor(
    private readonly index: VectorIndex,
    private readonly completion: CompletionService,
    private readonly logger: Logger,
    options: AnswererOptions = {},
  ) {
    this.topK = options.topK ?? DEFAULT_TOP_K;
  }

  async ask(question: string): Promise<string> {
    const retrieval = await this.retrieve(question);
    if (retrieval.kind === "answered") return retrieval.text;

    try {
      return await this.completion.complete(retrieval.request);
    } catch (err) {
      return completionFailureMessage(err, this.logger);
    }
  }

  /**
   * Streams answer deltas to `onChunk`. Degraded outcomes are delivered as a
   * single chunk and returned, so callers can print chunks unconditionally.
   */
  async askStream(
    question: string,
    onChunk: (text: string) => void,
  ): Promise<string> {
    const retrieval = await this.retrieve(question);
    if (retrieval.kind === "answered") {
      onChunk(retrieval.text);
      return retrieval.text;
    }

    let streamed = false;
    try {
      return await this.completion.stream(retrieval.request, (delta) => {
        streamed = true;
        onChunk(delta);
      });
    } catch (err) {
      const message = completionFailureMessage(err, this.logger);
      onChunk(streamed ? `\n${message}` : message);
      return message;
    }
  }

  private async retrieve(question: string): Promise<Retrieval> {
    const trimmed = question.trim();
    if (!trimmed) return { kind: "answered", text: EMPTY_QUESTION_MESSAGE };

    let hits: SearchHit[];
    try {
      hits = await this.index.search(trimmed, this.topK);
    } catch (err) {
      this.logger.error("Retrieval failed", { error: errorMessage(err) });
      return { kind: "answered", text: generationFailedMessage(err) };
    }

    if (hits.length === 0) return { kind: "answered", text: NO_DATA_MESSAGE };

    this.logger.debug("Retrieved context", {
      hits: hits.length,
      top: hits[0]?.similarity,
    });
    return { kind: "ready", request: buildPrompt(trimmed, hits) };
  }
}
