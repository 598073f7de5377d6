export { CONTENT_MAX_CHARS, createRecord, parsePublishedAt } from "./record.js";
export { normalizeUrl, deduplicate } from "./deduplicator.js";
export {
  BREAKING_CHANGE_PHRASES,
  MAX_TAGS,
  classify,
  detectCategory,
  extractTags,
  isBreakingChange,
  type ClassifierOptions,
} from "./classifier.js";
export { DEFAULT_KEYWORDS_PATH, loadKeywordTable } from "./keywords.js";
export {
  FUTURE_TOLERANCE_MS,
  filterRecords,
  rejectionReason,
  type Thresholds,
} from "./filter.js";
export {
  BREAKING_CHANGE_BONUS,
  CATEGORY_WEIGHTS,
  SOURCE_WEIGHTS,
  explainScore,
  scoreRecords,
  scoredAt,
  type ScoreBreakdown,
} from "./scorer.js";
export { processRecords, rankRecords, type ProcessOptions } from "./rank.js";
