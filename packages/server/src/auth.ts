import { createHash, timingSafeEqual } from "node:crypto";
import type { RequestHandler, Request, Response, NextFunction } from "express";

// Module augmentation: attach clientId to Express requests
declare global {
  namespace Express {
    interface Request {
      clientId?: string;
    }
  }
}

// Keys are compared as SHA-256 digests so every comparison has equal length.
function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/** Bearer-key auth against an API_KEYS map of key -> client id. */
export function createAuthMiddleware(
  apiKeys: Record<string, string>,
): RequestHandler {
  const known = Object.entries(apiKeys).map(([key, clientId]) => ({
    hash: digest(key),
    clientId,
  }));

  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      res.status(401).json({ error: "Missing Authorization header" });
      return;
    }

    const parts = authHeader.split(" ");
    if (parts.length !== 2 || parts[0] !== "Bearer" || !parts[1]) {
      res.status(401).json({
        error: "Invalid Authorization format. Expected: Bearer <key>",
      });
      return;
    }

    const presented = digest(parts[1]);
    const match = known.find((entry) => timingSafeEqual(entry.hash, presented));
    if (!match) {
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    req.clientId = match.clientId;
    next();
  };
}

// ---------------------------------------------------------------------------
// Rate limiter (sliding one-minute window per client)
// ---------------------------------------------------------------------------

export interface RateLimiterOptions {
  clock?: () => number;
  /** Sweep interval for idle clients; 0 disables the timer. */
  cleanupIntervalMs?: number;
}

export type RateLimiter = RequestHandler & { shutdown: () => void };

const WINDOW_MS = 60_000;

export function createRateLimiter(
  maxPerMinute: number,
  options: RateLimiterOptions = {},
): RateLimiter {
  const clock = options.clock ?? Date.now;
  const cleanupIntervalMs = options.cleanupIntervalMs ?? WINDOW_MS;
  const timestamps = new Map<string, number[]>();

  function inWindow(clientId: string, now: number): number[] {
    return (timestamps.get(clientId) ?? []).filter((t) => now - t < WINDOW_MS);
  }

  const cleanupInterval =
    cleanupIntervalMs > 0
      ? setInterval(() => {
          const now = clock();
          for (const clientId of timestamps.keys()) {
            const valid = inWindow(clientId, now);
            if (valid.length === 0) timestamps.delete(clientId);
            else timestamps.set(clientId, valid);
          }
        }, cleanupIntervalMs)
      : undefined;
  cleanupInterval?.unref();

  const handler: RequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction,
  ) => {
    const clientId = req.clientId;
    if (!clientId) {
      next();
      return;
    }

    const now = clock();
    const valid = inWindow(clientId, now);

    if (valid.length >= maxPerMinute) {
      const oldestInWindow = valid[0] ?? now;
      const retryAfterMs = oldestInWindow + WINDOW_MS - now;
      res.setHeader("Retry-After", String(Math.ceil(retryAfterMs / 1000)));
      res.status(429).json({ error: "Rate limit exceeded", retryAfterMs });
      return;
    }

    valid.push(now);
    timestamps.set(clientId, valid);
    next();
  };

  return Object.assign(handler, {
    shutdown: () => {
      if (cleanupInterval) clearInterval(cleanupInterval);
    },
  });
}
