/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response. Logs each error as one JSON line.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import {
  ErrorCodes,
  FatalConfigurationError,
  ReasoningUnavailableError,
  type ErrorCode,
} from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Error response type
// ---------------------------------------------------------------------------

export interface StructuredError {
  error: string;
  code: string;
  status: ContentfulStatusCode;
}

// ---------------------------------------------------------------------------
// Error mapper: known error types → structured response
// ---------------------------------------------------------------------------

function fromCode(code: ErrorCode, error?: string): StructuredError {
  const entry = ErrorCodes[code];
  return { error: error ?? entry.message, code, status: entry.status };
}

export function mapErrorToResponse(err: unknown): StructuredError {
  // Missing credentials or a reasoning service that never answered
  if (err instanceof FatalConfigurationError || err instanceof ReasoningUnavailableError) {
    return fromCode("SERVICE_UNAVAILABLE", "The analysis service is temporarily unavailable");
  }

  return fromCode("INTERNAL_ERROR");
}

// ---------------------------------------------------------------------------
// Logging helper
// ---------------------------------------------------------------------------

function logError(err: unknown, path: string, method: string): void {
  const timestamp = new Date().toISOString();
  const errMsg = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  const stack = err instanceof Error ? err.stack : undefined;

  console.error(
    JSON.stringify({
      level: "error",
      timestamp,
      method,
      path,
      error: errMsg,
      ...(stack && { stack }),
    }),
  );
}

// ---------------------------------------------------------------------------
// Hono handlers
// ---------------------------------------------------------------------------

/**
 * Global error handler for Hono's app.onError().
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  logError(err, c.req.path, c.req.method);
  const structured = mapErrorToResponse(err);
  return c.json(structured, structured.status);
}

/**
 * Global 404 handler for Hono's app.notFound().
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: "NOT_FOUND",
      status: 404,
    },
    404,
  );
}
