import {
  createRecord,
  errorMessage,
  type Logger,
  type NewsRecord,
} from "@trendwire/shared";
import type { RssFeed } from "./config.js";
import { fetchFeed, type FeedEntry } from "./http.js";
import type { FetchFn, ProducerContext, SourceProducer } from "./types.js";

export interface RssProducerOptions {
  feeds: readonly RssFeed[];
  enabled?: boolean;
}

/** Blog and news feeds; each record carries its feed's configured category. */
export class RssFeedProducer implements SourceProducer {
  readonly name = "rss";
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly options: RssProducerOptions,
    context: ProducerContext,
  ) {
    this.logger = context.logger.child({ source: this.name });
    this.fetchFn = context.fetchFn ?? fetch;
  }

  isEnabled(): boolean {
    return (this.options.enabled ?? true) && this.options.feeds.length > 0;
  }

  async fetch(since: Date): Promise<NewsRecord[]> {
    const records: NewsRecord[] = [];
    let failed = 0;

    for (const feed of this.options.feeds) {
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

      for (const entry of entries) {
        if (!entry.link || !entry.publishedAt) continue;
        if (entry.publishedAt.getTime() <= since.getTime()) continue;

        records.push(
          createRecord({
            title: entry.title,
            url: entry.link,
            source: feed.name,
            source_type: "rss",
            category: feed.category,
            published_at: entry.publishedAt.toISOString(),
            content: entry.summary,
            extra: { feed_category: feed.category },
          }),
        );
      }
    }

    if (failed > 0 && failed === this.options.feeds.length) {
      throw new Error(`All ${failed} RSS feeds failed`);
    }
    return records;
  }
}
