// =============================================================================
// @trendwire/worker — GitHub releases producer
// =============================================================================
// Per configured repo: repo metadata for the star count (best effort), then
// the 10 most recent releases. A 404 means the repo has no releases; any
// other failure skips that repo, and the producer rejects only if all fail.
// =============================================================================

import { z } from "zod";
import {
  SourceFetchError,
  createRecord,
  errorMessage,
  type Logger,
  type NewsRecord,
} from "@trendwire/shared";
import type { GitHubRepo } from "./config.js";
import { fetchJson } from "./http.js";
import type { FetchFn, ProducerContext, SourceProducer } from "./types.js";

export const GITHUB_API_URL = "https://api.github.com";

const RepoMetaSchema = z.object({
  stargazers_count: z.number().int().min(0).default(0),
});

const ReleaseSchema = z.object({
  tag_name: z.string().default(""),
  name: z.string().nullish(),
  html_url: z.string().url(),
  body: z.string().nullish(),
  published_at: z.string().nullish(),
  created_at: z.string().nullish(),
});
type Release = z.infer<typeof ReleaseSchema>;

export interface GitHubProducerOptions {
  repos: readonly GitHubRepo[];
  enabled?: boolean;
  token?: string;
}

/** `[Name] tag: release name`, without a dangling separator */
export function releaseTitle(name: string, release: Release): string {
  return `[${name}] ${release.tag_name}: ${release.name ?? ""}`.replace(
    /[: ]+$/,
    "",
  );
}

export class GitHubReleasesProducer implements SourceProducer {
  readonly name = "github";
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly options: GitHubProducerOptions,
    context: ProducerContext,
  ) {
    this.logger = context.logger.child({ source: this.name });
    this.fetchFn = context.fetchFn ?? fetch;
  }

  isEnabled(): boolean {
    return (this.options.enabled ?? true) && this.options.repos.length > 0;
  }

  async fetch(since: Date): Promise<NewsRecord[]> {
    const records: NewsRecord[] = [];
    let failed = 0;

    for (const repo of this.options.repos) {
      try {
        records.push(...(await this.fetchRepo(repo, since)));
      } catch (err) {
        this.logger.warn("Release fetch failed", {
          repo: `${repo.owner}/${repo.repo}`,
          error: errorMessage(err),
        });
        failed++;
      }
    }

    if (failed > 0 && failed === this.options.repos.length) {
      throw new Error(`All ${failed} GitHub repos failed`);
    }
    return records;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
    };
    if (this.options.token) {
      headers["Authorization"] = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  private async fetchStars(slug: string): Promise<number> {
    try {
      const body = await fetchJson(
        this.fetchFn,
        `${GITHUB_API_URL}/repos/${slug}`,
        this.headers(),
      );
      return RepoMetaSchema.parse(body).stargazers_count;
    } catch (err) {
      this.logger.debug("Repo metadata unavailable", {
        repo: slug,
        error: errorMessage(err),
      });
      return 0;
    }
  }

  private async fetchRepo(repo: GitHubRepo, since: Date): Promise<NewsRecord[]> {
    const slug = `${repo.owner}/${repo.repo}`;
    const stars = await this.fetchStars(slug);

    let body: unknown;
    try {
      body = await fetchJson(
        this.fetchFn,
        `${GITHUB_API_URL}/repos/${slug}/releases?per_page=10`,
        this.headers(),
      );
    } catch (err) {
      if (err instanceof SourceFetchError && err.status === 404) {
        this.logger.debug("No releases, skipping", { repo: slug });
        return [];
      }
      throw err;
    }

    const releases = z.array(z.unknown()).parse(body);

    const records: NewsRecord[] = [];
    for (const raw of releases) {
      const parsed = ReleaseSchema.safeParse(raw);
      if (!parsed.success) continue;
      const release = parsed.data;

      const published = new Date(
        release.published_at ?? release.created_at ?? "",
      );
      if (Number.isNaN(published.getTime())) continue;
      if (published.getTime() <= since.getTime()) continue;

      records.push(
        createRecord({
          title: releaseTitle(repo.name, release),
          url: release.html_url,
          source: `${repo.name} GitHub`,
          source_type: "github",
          category: "other",
          published_at: published.toISOString(),
          content: release.body ?? "",
          raw_score: stars,
          extra: { version: release.tag_name, repo: slug, stars },
        }),
      );
    }
    return records;
  }
}
