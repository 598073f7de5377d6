import { timingSafeEqual } from "node:crypto";
import type { RequestHandler, Request, Response, NextFunction } from "express";

// Module augmentation: attach clientId to Express requests
declare global {
  namespace Express {
    interface Request {
      clientId?: string;
    }
  }
}

function sameKey(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/** Resolves the client ID for a presented key, or undefined. */
export function resolveClient(
  apiKeys: Record<string, string>,
  presented: string,
): string | undefined {
  for (const [key, clientId] of Object.entries(apiKeys)) {
    if (sameKey(key, presented)) return clientId;
  }
  return undefined;
}

export function createAuthMiddleware(
  apiKeys: Record<string, string>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      res.status(401).json({ error: "Missing Authorization header" });
      return;
    }

    const [scheme, key, ...rest] = authHeader.split(" ");
    if (scheme !== "Bearer" || !key || rest.length > 0) {
      res.status(401).json({
        error: "Invalid Authorization format. Expected: Bearer <key>",
      });
      return;
    }

    const clientId = resolveClient(apiKeys, key);
    if (!clientId) {
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    req.clientId = clientId;
    next();
  };
}

export type RateLimiter = RequestHandler & { shutdown: () => void };

/** Sliding one-minute window per client ID. */
export function createRateLimiter(maxPerMinute: number): RateLimiter {
  const windowMs = 60_000;
  const timestamps = new Map<string, number[]>();

  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [clientId, times] of timestamps) {
      const valid = times.filter((t) => now - t < windowMs);
      if (valid.length === 0) timestamps.delete(clientId);
      else timestamps.set(clientId, valid);
    }
  }, windowMs);
  cleanupInterval.unref();

  const handler: RequestHandler = (req, res, next) => {
    const clientId = req.clientId;
    if (!clientId) {
      next();
      return;
    }

    const now = Date.now();
    const validTimes = (timestamps.get(clientId) ?? []).filter(
      (t) => now - t < windowMs,
    );

    const oldestInWindow = validTimes[0];
    if (oldestInWindow !== undefined && validTimes.length >= maxPerMinute) {
      const retryAfterMs = oldestInWindow + windowMs - now;
      res.setHeader("Retry-After", String(Math.ceil(retryAfterMs / 1000)));
      res.status(429).json({ error: "Rate limit exceeded", retryAfterMs });
      return;
    }

    validTimes.push(now);
    timestamps.set(clientId, validTimes);
    next();
  };

  return Object.assign(handler, {
    shutdown: () => clearInterval(cleanupInterval),
  });
}
