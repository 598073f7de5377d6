import type { Config } from "@trendwire/shared";
import type { SourcesConfig } from "./config.js";
import { ForumProducer } from "./forum.js";
import { GitHubReleasesProducer } from "./github.js";
import { PaperFeedProducer } from "./paper.js";
import { RssFeedProducer } from "./rss.js";
import type { ProducerContext, SourceProducer } from "./types.js";

export {
  DEFAULT_SOURCES_PATH,
  SourcesFileSchema,
  loadSourcesConfig,
  type GitHubRepo,
  type PaperFeed,
  type RssFeed,
  type SourcesConfig,
} from "./config.js";
export { fetchFeed, fetchJson, stripHtml, type FeedEntry } from "./http.js";
export { ForumProducer, HN_ITEM_URL, searchUrl } from "./forum.js";
export { GITHUB_API_URL, GitHubReleasesProducer, releaseTitle } from "./github.js";
export { PaperFeedProducer } from "./paper.js";
export { RssFeedProducer } from "./rss.js";
export type { FetchFn, ProducerContext, SourceProducer } from "./types.js";

/** One producer per source kind, in the order they are fetched. */
export function createProducers(
  sources: SourcesConfig,
  config: Pick<Config, "FORUM_MIN_SCORE" | "GITHUB_TOKEN">,
  context: ProducerContext,
): SourceProducer[] {
  return [
    new GitHubReleasesProducer(
      {
        repos: sources.github.repos,
        enabled: sources.github.enabled,
        token: config.GITHUB_TOKEN,
      },
      context,
    ),
    new RssFeedProducer(
      { feeds: sources.rss.feeds, enabled: sources.rss.enabled },
      context,
    ),
    new ForumProducer(
      {
        keywords: sources.forum.keywords,
        minScore: config.FORUM_MIN_SCORE,
        hitsPerPage: sources.forum.hits_per_page,
        enabled: sources.forum.enabled,
      },
      context,
    ),
    new PaperFeedProducer(
      {
        feeds: sources.paper.feeds,
        topN: sources.paper.top_n,
        enabled: sources.paper.enabled,
      },
      context,
    ),
  ];
}
