// =============================================================================
// @trendwire/worker — Source producer configuration file
// =============================================================================
// Which repos, feeds and keywords each producer polls. The bundled file is
// data/sources.json; SOURCES_FILE points at a replacement.
// =============================================================================

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { CATEGORIES } from "@trendwire/shared";

const GitHubRepoSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
  name: z.string().min(1),
});

const RssFeedSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  category: z.enum(CATEGORIES).default("other"),
});

const PaperFeedSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
});

export const SourcesFileSchema = z.object({
  github: z
    .object({
      enabled: z.boolean().default(true),
      repos: z.array(GitHubRepoSchema).default([]),
    })
    .default({}),
  rss: z
    .object({
      enabled: z.boolean().default(true),
      feeds: z.array(RssFeedSchema).default([]),
    })
    .default({}),
  forum: z
    .object({
      enabled: z.boolean().default(true),
      keywords: z.array(z.string().min(1)).default([]),
      hits_per_page: z.number().int().min(1).max(100).default(15),
    })
    .default({}),
  paper: z
    .object({
      enabled: z.boolean().default(true),
      top_n: z.number().int().min(1).default(20),
      feeds: z.array(PaperFeedSchema).default([]),
    })
    .default({}),
});

export type SourcesConfig = z.infer<typeof SourcesFileSchema>;
export type GitHubRepo = z.infer<typeof GitHubRepoSchema>;
export type RssFeed = z.infer<typeof RssFeedSchema>;
export type PaperFeed = z.infer<typeof PaperFeedSchema>;

export const DEFAULT_SOURCES_PATH = fileURLToPath(
  new URL("../../data/sources.json", import.meta.url),
);

export async function loadSourcesConfig(
  path: string = DEFAULT_SOURCES_PATH,
): Promise<SourcesConfig> {
  const raw = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return SourcesFileSchema.parse(parsed);
}
