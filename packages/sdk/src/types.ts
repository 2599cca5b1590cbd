/**
 * @presign/sdk — SDK types.
 *
 * Types specific to the SDK client layer.
 * Authorization shapes are imported from @presign/types.
 */

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration for the Presign SDK client.
 */
export interface PresignClientConfig {
  /** Base URL of the relayer (e.g., "http://localhost:3000") */
  readonly baseUrl: string;
  /** API key for authentication (omit against an unsecured relayer) */
  readonly apiKey?: string | undefined;
  /**
   * Caller address sent as X-Caller-Address. Only an unsecured relayer
   * reads it; a secured one binds the caller to the API key.
   */
  readonly callerAddress?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum GET retry attempts for 5xx and network errors (default: 3). POST is never retried. */
  readonly retries?: number | undefined;
  /** First backoff delay in milliseconds, doubled per attempt (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * A parsed response together with its transport metadata.
 */
export interface PresignResponse<T> {
  /** Response payload */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the relayer, or from the transport around it.
 *
 * `code` is the relayer's error code (e.g. "AUTHORIZATION_ALREADY_USED")
 * or one of NETWORK_ERROR, TIMEOUT, INVALID_RESPONSE. `statusCode` is 0
 * when no response arrived.
 */
export class PresignError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "PresignError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
