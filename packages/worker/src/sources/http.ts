import Parser from "rss-parser";
import { SourceFetchError } from "@trendwire/shared";
import type { FetchFn } from "./types.js";

const USER_AGENT = "trendwire-ingest/0.1";
const REQUEST_TIMEOUT_MS = 10_000;

async function request(
  fetchFn: FetchFn,
  url: string,
  headers: Record<string, string>,
): Promise<Response> {
  const res = await fetchFn(url, {
    headers: { "User-Agent": USER_AGENT, ...headers },
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });
  if (!res.ok) {
    throw new SourceFetchError(
      `GET ${url} failed: ${res.status} ${res.statusText}`,
      res.status,
    );
  }
  return res;
}

export async function fetchJson(
  fetchFn: FetchFn,
  url: string,
  headers: Record<string, string> = {},
): Promise<unknown> {
  const res = await request(fetchFn, url, {
    Accept: "application/json",
    ...headers,
  });
  const body: unknown = await res.json();
  return body;
}

// ---------------------------------------------------------------------------
// RSS / Atom
// ---------------------------------------------------------------------------

export interface FeedEntry {
  title: string;
  link: string;
  publishedAt: Date | null;
  summary: string;
}

const parser = new Parser();

/** Tags become spaces; `&amp;` is decoded last so `&amp;lt;` stays `&lt;`. */
export function stripHtml(text: string): string {
  return text
    .replace(/<[^>]*>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}

/** Downloads and parses a feed; entries keep document order. */
export async function fetchFeed(
  fetchFn: FetchFn,
  url: string,
): Promise<FeedEntry[]> {
  const res = await request(fetchFn, url, {
    Accept: "application/rss+xml, application/atom+xml, application/xml",
  });
  const feed = await parser.parseString(await res.text());

  return feed.items.map((item) => ({
    title: (item.title ?? "").trim(),
    link: (item.link ?? "").trim(),
    publishedAt: parseDate(item.isoDate) ?? parseDate(item.pubDate),
    summary: stripHtml(item.content ?? item.summary ?? item.contentSnippet ?? ""),
  }));
}
