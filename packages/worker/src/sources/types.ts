import type { Logger, NewsRecord } from "@trendwire/shared";

/**
 * One external source. `fetch` returns fetch-time records (score 0, no
 * tags) published strictly after `since`. A producer may swallow failures
 * of individual feeds or repos, but a total failure rejects.
 */
export interface SourceProducer {
  readonly name: string;
  isEnabled(): boolean;
  fetch(since: Date): Promise<NewsRecord[]>;
}

export type FetchFn = typeof fetch;

export interface ProducerContext {
  logger: Logger;
  /** Defaults to the global fetch */
  fetchFn?: FetchFn;
}
