// =============================================================================
// @trendwire/shared — External service boundaries
// =============================================================================
// The core components depend on these request/response interfaces only.
// Gemini and Anthropic implementations live in ./embeddings and ./anthropic;
// tests substitute in-process fakes.
// =============================================================================

/** Outcome of a liveness probe against an external dependency. */
export interface HealthCheckResult {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

/** `document` when indexing, `query` when searching */
export type EmbeddingKind = "document" | "query";

export interface EmbeddingService {
  /** Fixed-length vector for `text`; rejects on failure. */
  embed(text: string, kind: EmbeddingKind): Promise<number[]>;
}

export interface CompletionRequest {
  system: string;
  user: string;
}

export interface CompletionService {
  complete(request: CompletionRequest): Promise<string>;
  /**
   * Streams text deltas to `onText` and resolves with the full text, which
   * equals the concatenation of the deltas.
   */
  stream(
    request: CompletionRequest,
    onText: (delta: string) => void,
  ): Promise<string>;
}
