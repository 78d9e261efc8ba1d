import { rateLimiter } from "hono-rate-limiter";
import type { Context } from "hono";
import {
  RATE_LIMIT_MAX,
  RATE_LIMIT_WINDOW_MS,
} from "../config/constants.ts";
import { apiError } from "../lib/errors.ts";

/**
 * Per-client rate limiter for the /api/v1 routes.
 *
 * 30 requests per minute, keyed by the first x-forwarded-for address.
 * Over the limit the request ends with the standard RATE_LIMITED error body.
 */
export function clientKey(c: Context): string {
  const forwarded = c.req.header("x-forwarded-for");
  const first = forwarded?.split(",")[0]?.trim();
  return first || c.req.header("x-real-ip") || "anonymous";
}

export function createApiRateLimiter(limit: number = RATE_LIMIT_MAX) {
  return rateLimiter({
    windowMs: RATE_LIMIT_WINDOW_MS,
    limit,
    keyGenerator: clientKey,
    handler: (c) => apiError(c, "RATE_LIMITED"),
  });
}
