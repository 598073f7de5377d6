// =============================================================================
// Shared test helpers: record factory and a capturing logger
// =============================================================================

import { createLogger, type Logger } from "../logger.js";
import { createRecord } from "../pipeline/record.js";
import type { NewsRecord } from "../types.js";

export function makeRecord(overrides: Partial<NewsRecord> = {}): NewsRecord {
  const base = createRecord({
    title: "Untitled",
    url: "https://example.com/item",
    source: "Example Feed",
    source_type: "rss",
    category: "other",
    published_at: "2025-06-01T10:00:00.000Z",
  });
  return { ...base, ...overrides };
}

export interface LogEntry {
  level: string;
  msg: string;
  [key: string]: unknown;
}

export interface CapturingLogger {
  logger: Logger;
  entries: LogEntry[];
  messages(level?: string): string[];
}

/** Logger that keeps every JSON line it writes, parsed. */
export function createCapturingLogger(): CapturingLogger {
  const entries: LogEntry[] = [];
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
          entries.push({ ...parsed, level: parsed.level, msg: parsed.msg });
        }
        return true;
      },
    },
  });
  return {
    logger,
    entries,
    messages: (level) =>
      entries.filter((e) => !level || e.level === level).map((e) => e.msg),
  };
}
