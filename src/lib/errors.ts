/**
 * Standardized Error Handling
 *
 * Error taxonomy for the assistant plus the JSON error shape every route
 * returns. Format: { error: string, code: string, status: number, details?: unknown }
 */

import type { Context } from "hono";

export interface ApiError {
  error: string;
  code: string;
  status: number;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 400 Bad Request
  VALIDATION_FAILED: { status: 400, message: "Validation failed" },
  INVALID_JSON: { status: 400, message: "Request body must be valid JSON" },

  // 404 Not Found
  STOCK_NOT_FOUND: { status: 404, message: "Stock not found" },

  // 429 Too Many Requests
  RATE_LIMITED: { status: 429, message: "Too many requests" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, message: "Internal server error" },

  // 502 Bad Gateway
  PROVIDER_UNAVAILABLE: { status: 502, message: "Market data provider unavailable" },
  EMAIL_DELIVERY_FAILED: { status: 502, message: "Failed to send email" },

  // 503 Service Unavailable
  SERVICE_UNAVAILABLE: { status: 503, message: "Service unavailable" },
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

/**
 * Create a standardized API error response
 */
export function apiError(c: Context, errorCode: ErrorCode, details?: unknown) {
  const { status, message } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: message,
    code: errorCode,
    status,
    ...(details !== undefined && { details }),
  };
  return c.json(response, status);
}

/** Message text of anything that was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

/**
 * The market data provider could not supply data (network, HTTP status,
 * unexpected payload, unknown symbol). Never leaves the gateway: it is
 * converted into an error-shaped result there.
 */
export class ProviderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderError";
  }
}

/**
 * Credentials or configuration for the reasoning service are missing.
 * Not recoverable; surfaces as 503.
 */
export class FatalConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalConfigurationError";
  }
}

/**
 * The reasoning service failed before the agent loop produced anything.
 * Surfaces as 503 with the underlying cause attached.
 */
export class ReasoningUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReasoningUnavailableError";
  }
}
