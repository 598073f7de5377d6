// =============================================================================
// @trendwire/shared — Trend digest over the rolling snapshot
// =============================================================================
// Picks the high-scoring records (score >= 60, top 20; else the top 10),
// lays them out as a numbered brief and asks the completion service for the
// 3 to 5 most important developments with breaking changes called out.
// Never throws; failures come back as the answerer's degraded messages.
// =============================================================================

import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CompletionRequest, CompletionService } from "../services.js";
import type { NewsRecord } from "../types.js";
import {
  completionFailureMessage,
  generationFailedMessage,
} from "./answerer.js";

export const NO_RECORDS_MESSAGE =
  "No records in the snapshot yet. Run ingestion first.";

export const DIGEST_SUMMARY_MAX_CHARS = 200;

export interface DigestOptions {
  minScore?: number;
  maxItems?: number;
  /** How many top records to use when none reaches minScore */
  fallbackItems?: number;
}

const DEFAULTS = { minScore: 60, maxItems: 20, fallbackItems: 10 };

const SYSTEM_PROMPT = [
  "You are an analyst of AI technology trends writing a short briefing.",
  "Using only the collected items below, summarize the 3 to 5 most important developments.",
  "Call out every breaking change explicitly.",
  "Finish with the single item most worth attention and why.",
].join(" ");

// ---------------------------------------------------------------------------
// Selection and prompt
// ---------------------------------------------------------------------------

export function selectDigestItems(
  records: readonly NewsRecord[],
  options: DigestOptions = {},
): NewsRecord[] {
  const { minScore, maxItems, fallbackItems } = { ...DEFAULTS, ...options };
  const ranked = [...records].sort((a, b) => b.score - a.score);
  const high = ranked.filter((r) => r.score >= minScore).slice(0, maxItems);
  return high.length > 0 ? high : ranked.slice(0, fallbackItems);
}

export function formatDigestItem(record: NewsRecord, position: number): string {
  const lines = [
    `${position}. [${record.category.toUpperCase()}] ${record.title}`,
    `   source: ${record.source} | date: ${record.published_at.slice(0, 10)} | score: ${record.score.toFixed(0)}`,
  ];
  if (record.is_breaking_change) lines.push("   BREAKING CHANGE");
  const summary = record.content.slice(0, DIGEST_SUMMARY_MAX_CHARS).trim();
  if (summary) lines.push(`   summary: ${summary}`);
  return lines.join("\n");
}

export function buildDigestPrompt(items: readonly NewsRecord[]): CompletionRequest {
  const body = items.map((r, i) => formatDigestItem(r, i + 1)).join("\n\n");
  return {
    system: SYSTEM_PROMPT,
    user: `Collected AI news items, highest score first:\n\n${body}`,
  };
}

// ---------------------------------------------------------------------------
// Digest
// ---------------------------------------------------------------------------

type Preparation =
  | { kind: "ready"; request: CompletionRequest }
  | { kind: "answered"; text: string };

export class TrendDigest {
  constructor(
    private readonly store: { loadLatest(): Promise<NewsRecord[]> },
    private readonly completion: CompletionService,
    private readonly logger: Logger,
    private readonly options: DigestOptions = {},
  ) {}

  async digest(): Promise<string> {
    const prepared = await this.prepare();
    if (prepared.kind === "answered") return prepared.text;
    try {
      return await this.completion.complete(prepared.request);
    } catch (err) {
      return completionFailureMessage(err, this.logger);
    }
  }

  /** Same outcomes as digest(), delivered as deltas to `onChunk`. */
  async digestStream(onChunk: (text: string) => void): Promise<string> {
    const prepared = await this.prepare();
    if (prepared.kind === "answered") {
      onChunk(prepared.text);
      return prepared.text;
    }

    let streamed = false;
    try {
      return await this.completion.stream(prepared.request, (delta) => {
        streamed = true;
        onChunk(delta);
      });
    } catch (err) {
      const message = completionFailureMessage(err, this.logger);
      onChunk(streamed ? `\n${message}` : message);
      return message;
    }
  }

  private async prepare(): Promise<Preparation> {
    let records: NewsRecord[];
    try {
      records = await this.store.loadLatest();
    } catch (err) {
      this.logger.error("Failed to load snapshot for digest", {
        error: errorMessage(err),
      });
      return { kind: "answered", text: generationFailedMessage(err) };
    }

    const items = selectDigestItems(records, this.options);
    if (items.length === 0) return { kind: "answered", text: NO_RECORDS_MESSAGE };

    this.logger.debug("Digest items selected", {
      items: items.length,
      breaking: items.filter((r) => r.is_breaking_change).length,
    });
    return { kind: "ready", request: buildDigestPrompt(items) };
  }
}
