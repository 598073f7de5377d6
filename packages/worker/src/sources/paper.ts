// =============================================================================
// @trendwire/worker — arXiv paper producer
// =============================================================================
// Reads the configured arXiv RSS listings. Category is pinned to "paper".
// Each feed contributes at most max(1, floor(topN / feeds)) entries and
// the producer returns at most topN.
// =============================================================================

import {
  createRecord,
  errorMessage,
  type Logger,
  type NewsRecord,
} from "@trendwire/shared";
import type { PaperFeed } from "./config.js";
import { fetchFeed, type FeedEntry } from "./http.js";
import type { FetchFn, ProducerContext, SourceProducer } from "./types.js";

export interface PaperProducerOptions {
  feeds: readonly PaperFeed[];
  topN?: number;
  enabled?: boolean;
}

export class PaperFeedProducer implements SourceProducer {
  readonly name = "paper";
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly options: PaperProducerOptions,
    context: ProducerContext,
  ) {
    this.logger = context.logger.child({ source: this.name });
    this.fetchFn = context.fetchFn ?? fetch;
  }

  isEnabled(): boolean {
    return (this.options.enabled ?? true) && this.options.feeds.length > 0;
  }

  async fetch(since: Date): Promise<NewsRecord[]> {
    const { feeds } = this.options;
    const topN = this.options.topN ?? 20;
    const perFeed = Math.max(1, Math.floor(topN / Math.max(1, feeds.length)));

    const seenLinks = new Set<string>();
    const records: NewsRecord[] = [];
    let failed = 0;

    for (const feed of feeds) {
      let entries: FeedEntry[];
      try {
        entries = await fetchFeed(this.fetchFn, feed.url);
      } catch (err) {
        this.logger.warn("Feed fetch failed", {
          feed: feed.name,
          error: errorMessage(err),
        });
        failed++;
        continue;
      }

      let taken = 0;
      for (const entry of entries) {
        if (taken >= perFeed) break;
        if (!entry.link || seenLinks.has(entry.link)) continue;
        seenLinks.add(entry.link);

        if (!entry.publishedAt) continue;
        if (entry.publishedAt.getTime() <= since.getTime()) continue;

        records.push(
          createRecord({
            title: entry.title,
            url: entry.link,
            source: feed.name,
            source_type: "paper",
            category: "paper",
            published_at: entry.publishedAt.toISOString(),
            content: entry.summary,
            extra: { feed: feed.name },
          }),
        );
        taken++;
      }
    }

    if (failed > 0 && failed === feeds.length) {
      throw new Error(`All ${failed} paper feeds failed`);
    }
    return records.slice(0, topN);
  }
}
