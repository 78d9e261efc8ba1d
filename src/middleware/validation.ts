/**
 * Input Validation Middleware
 *
 * Zod-based request validation for Hono routes. On success the parsed
 * (and transformed) value is available to the handler, typed, at
 * c.get("validatedBody") / c.get("validatedQuery"). On failure the request
 * ends with a structured 400.
 */

import { createMiddleware } from "hono/factory";
import type { z } from "zod";
import { apiError } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Validation issue format
// ---------------------------------------------------------------------------

export interface ValidationIssue {
  path: string;
  message: string;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}

// ---------------------------------------------------------------------------
// Generic validator middleware factories
// ---------------------------------------------------------------------------

/**
 * Validates the JSON request body against a Zod schema.
 */
export function validateBody<T extends z.ZodType>(schema: T) {
  return createMiddleware<{ Variables: { validatedBody: z.output<T> } }>(async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return apiError(c, "INVALID_JSON", {
        issues: [{ path: "body", message: "Failed to parse JSON" }],
      });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return apiError(c, "VALIDATION_FAILED", { issues: toValidationIssues(result.error) });
    }

    c.set("validatedBody", result.data);
    await next();
  });
}

/**
 * Validates query string parameters against a Zod schema.
 */
export function validateQuery<T extends z.ZodType>(schema: T) {
  return createMiddleware<{ Variables: { validatedQuery: z.output<T> } }>(async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return apiError(c, "VALIDATION_FAILED", { issues: toValidationIssues(result.error) });
    }

    c.set("validatedQuery", result.data);
    await next();
  });
}
