// =============================================================================
// @trendwire/worker — Hacker News producer (Algolia search API)
// =============================================================================

import { z } from "zod";
import {
  createRecord,
  errorMessage,
  type Logger,
  type NewsRecord,
} from "@trendwire/shared";
import { fetchJson } from "./http.js";
import type { FetchFn, ProducerContext, SourceProducer } from "./types.js";

export const HN_SEARCH_URL = "https://hn.algolia.com/api/v1/search";
export const HN_ITEM_URL = "https://news.ycombinator.com/item?id=";

const HitSchema = z.object({
  objectID: z.string().min(1),
  title: z.string().nullish(),
  url: z.string().nullish(),
  points: z.number().int().nullish(),
  num_comments: z.number().int().nullish(),
  created_at_i: z.number().int(),
});

const SearchResponseSchema = z.object({
  hits: z.array(z.unknown()).default([]),
});

export interface ForumProducerOptions {
  keywords: readonly string[];
  minScore: number;
  hitsPerPage?: number;
  enabled?: boolean;
}

export function searchUrl(
  keyword: string,
  minScore: number,
  since: Date,
  hitsPerPage: number,
): string {
  const params = new URLSearchParams({
    query: keyword,
    tags: "story",
    numericFilters: `points>=${minScore},created_at_i>=${Math.floor(since.getTime() / 1000)}`,
    hitsPerPage: String(hitsPerPage),
  });
  return `${HN_SEARCH_URL}?${params.toString()}`;
}

export class ForumProducer implements SourceProducer {
  readonly name = "forum";
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly options: ForumProducerOptions,
    context: ProducerContext,
  ) {
    this.logger = context.logger.child({ source: this.name });
    this.fetchFn = context.fetchFn ?? fetch;
  }

  isEnabled(): boolean {
    return (this.options.enabled ?? true) && this.options.keywords.length > 0;
  }

  async fetch(since: Date): Promise<NewsRecord[]> {
    const seenIds = new Set<string>();
    const records: NewsRecord[] = [];
    let failed = 0;

    for (const keyword of this.options.keywords) {
      let hits: unknown[];
      try {
        const body = await fetchJson(
          this.fetchFn,
          searchUrl(
            keyword,
            this.options.minScore,
            since,
            this.options.hitsPerPage ?? 15,
          ),
        );
        hits = SearchResponseSchema.parse(body).hits;
      } catch (err) {
        this.logger.warn("Search failed", { keyword, error: errorMessage(err) });
        failed++;
        continue;
      }

      for (const raw of hits) {
        const parsed = HitSchema.safeParse(raw);
        if (!parsed.success) continue;
        const hit = parsed.data;

        if (seenIds.has(hit.objectID)) continue;
        seenIds.add(hit.objectID);

        const publishedMs = hit.created_at_i * 1000;
        if (publishedMs <= since.getTime()) continue;

        records.push(
          createRecord({
            title: hit.title ?? "",
            url: hit.url || `${HN_ITEM_URL}${hit.objectID}`,
            source: "Hacker News",
            source_type: "forum",
            category: "other",
            published_at: new Date(publishedMs).toISOString(),
            raw_score: hit.points ?? 0,
            extra: { hn_id: hit.objectID, comments: hit.num_comments ?? 0 },
          }),
        );
      }
    }

    if (failed > 0 && failed === this.options.keywords.length) {
      throw new Error(`All ${failed} forum searches failed`);
    }
    return records;
  }
}
