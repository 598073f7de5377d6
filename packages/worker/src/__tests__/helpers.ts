// =============================================================================
// Worker test helpers: routed fake fetch and a capturing logger
// =============================================================================

import { vi } from "vitest";
import { createLogger, type Logger } from "@trendwire/shared";

export type Route = () => Response;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function xmlResponse(body: string): Response {
  return new Response(body, {
    status: 200,
    headers: { "Content-Type": "application/rss+xml" },
  });
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/** Answers each known URL from its route and everything else with a 404. */
export function createFakeFetch(routes: Record<string, Route>) {
  return vi.fn(
    async (
      input: string | URL | Request,
      _init?: RequestInit,
    ): Promise<Response> => {
      const route = routes[urlOf(input)];
      return route
        ? route()
        : new Response("not found", { status: 404, statusText: "Not Found" });
    },
  );
}

export function createTestLogger(): { logger: Logger; messages: string[] } {
  const messages: string[] = [];
  const logger = createLogger({
    level: "trace",
    sink: {
      write(chunk: string) {
        const entry: unknown = JSON.parse(chunk);
        if (
          typeof entry === "object" &&
          entry !== null &&
          "msg" in entry &&
          typeof entry.msg === "string"
        ) {
          messages.push(entry.msg);
        }
        return true;
      },
    },
  });
  return { logger, messages };
}
