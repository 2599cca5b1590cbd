/**
 * Relayer error codes and the response envelope.
 *
 * Every error response has the shape { error: { code, message, details? } }.
 * A code is either raised by the HTTP layer or carried up from a domain
 * error; ERROR_STATUS gives each one its status, and 500 means the domain
 * message is withheld.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { AuthorizationErrorCode } from "@presign/authorization";
import type { EventStoreErrorCode } from "@presign/event-store";
import type { LedgerErrorCode } from "@presign/ledger";
import type { TypedDataErrorCode } from "@presign/typed-data";

export type HttpErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "RATE_LIMITED"
  | "INTERNAL_ERROR";

export type DomainErrorCode =
  | AuthorizationErrorCode
  | TypedDataErrorCode
  | LedgerErrorCode
  | EventStoreErrorCode;

export type ApiErrorCode = HttpErrorCode | DomainErrorCode;

export const ERROR_STATUS: Readonly<Record<ApiErrorCode, ContentfulStatusCode>> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  RATE_LIMITED: 429,
  INTERNAL_ERROR: 500,

  // Submissions the signer or relayer can correct
  INVALID_AUTHORIZATION: 400,
  INVALID_SIGNATURE: 400,
  INVALID_FIELD: 400,
  INVALID_DOMAIN: 400,
  INVALID_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  CALLER_NOT_PAYEE: 403,
  AUTHORIZATION_ALREADY_USED: 409,
  CONCURRENCY_CONFLICT: 409,
  AUTHORIZATION_NOT_YET_VALID: 422,
  AUTHORIZATION_EXPIRED: 422,
  INSUFFICIENT_BALANCE: 422,
  SUPPLY_OVERFLOW: 422,

  // Broken invariants inside the relayer
  UNIT_ALREADY_COMMITTED: 500,
  ROLLBACK_FAILED: 500,
  INVALID_METADATA: 500,
  REVERSAL_OUT_OF_ORDER: 500,
  SNAPSHOT_MISMATCH: 500,
  INVALID_STREAM_ID: 500,
  INVALID_EVENT: 500,
  EMPTY_APPEND: 500,
  INVALID_VERSION: 500,
};

export function isApiErrorCode(code: string): code is ApiErrorCode {
  return Object.hasOwn(ERROR_STATUS, code);
}

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details !== undefined ? { error: { code, message, details } } : { error: { code, message } };
}
