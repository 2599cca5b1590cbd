/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (AuthorizationError, LedgerError, ...)
 * to HTTP status codes through ERROR_STATUS.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ERROR_STATUS, createErrorEnvelope, isApiErrorCode } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";

/**
 * The `code` of a structured domain error, if it is one the relayer knows.
 */
export function domainErrorCode(err: Error): ApiErrorCode | undefined {
  if (!("code" in err) || typeof err.code !== "string") {
    return undefined;
  }
  return isApiErrorCode(err.code) ? err.code : undefined;
}

export function statusForCode(code: ApiErrorCode | undefined): ContentfulStatusCode {
  return code !== undefined ? ERROR_STATUS[code] : 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = domainErrorCode(err);
  const status = statusForCode(code);

  // Don't leak internal details
  if (code === undefined || status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}
