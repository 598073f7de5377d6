export {
  CONNECTION_FAILED_MESSAGE,
  DEFAULT_TOP_K,
  EMPTY_QUESTION_MESSAGE,
  EXCERPT_MAX_CHARS,
  NO_DATA_MESSAGE,
  RetrievalAnswerer,
  buildPrompt,
  completionFailureMessage,
  formatExcerpt,
  generationFailedMessage,
  type AnswererOptions,
} from "./answerer.js";
export {
  DIGEST_SUMMARY_MAX_CHARS,
  NO_RECORDS_MESSAGE,
  TrendDigest,
  buildDigestPrompt,
  formatDigestItem,
  selectDigestItems,
  type DigestOptions,
} from "./digest.js";
