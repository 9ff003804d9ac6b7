import type { Context, MiddlewareHandler } from "hono";
import { rateLimiter } from "hono-rate-limiter";
import { logger } from "../logger.ts";

const HOUR_MS = 60 * 60 * 1000;

// Behind a proxy the first forwarded address is the client; otherwise all callers share a bucket
function clientKey(c: Context): string {
  const forwarded = c.req.header("X-Forwarded-For")?.split(",")[0]?.trim();
  return forwarded || "local";
}

/** Per-client cap on a route, counted over a rolling hour. Over the cap → 429. */
export function limitPerHour(limit: number): MiddlewareHandler {
  return rateLimiter({
    windowMs: HOUR_MS,
    limit,
    standardHeaders: "draft-6",
    keyGenerator: clientKey,
    handler: (c) => {
      logger.warn("Rate limit exceeded", { route: c.req.routePath, client: clientKey(c) });
      return c.json({ error: `rate limit exceeded, ${limit} requests per hour` }, 429);
    },
  });
}
