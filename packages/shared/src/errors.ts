// =============================================================================
// @trendwire/shared — Typed errors crossing component boundaries
// =============================================================================

/** Invalid or missing configuration detected at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The completion service could not be reached at all (DNS, refused
 * connection, timeout). Distinguished from API errors so callers can show a
 * connectivity message instead of the raw error.
 */
export class CompletionConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompletionConnectionError";
  }
}

/** A source producer received a non-success HTTP response. */
export class SourceFetchError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "SourceFetchError";
    this.status = status;
  }
}

/** Normalizes anything thrown into a loggable message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
