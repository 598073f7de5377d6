export {
  DEFAULT_RETRY_POLICY,
  createEmbeddingClient,
  createGeminiEmbeddingService,
  embedText,
  embeddingHealthCheck,
  isRetryable,
  withRetry,
  type EmbedContentApi,
  type EmbeddingClient,
  type RetryPolicy,
  type TaskType,
} from "./gemini.js";
