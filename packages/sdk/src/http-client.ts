/**
 * @presign/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - API key and caller address headers
 * - Request ID generation
 * - Timeout handling
 * - Retry logic for GET (exponential backoff for 5xx and network errors)
 * - Error normalization
 * - Response validation against a zod schema
 */

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import type { PresignClientConfig, PresignResponse } from "./types.js";
import { PresignError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return { raw: text };
  }
}

/**
 * Extract selected headers from a Response.
 */
function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = ["content-type", "x-request-id", "x-ratelimit-remaining", "retry-after"];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

const ErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

function errorFromBody(body: unknown, status: number, fallbackCode: string, fallbackMessage: string): PresignError {
  const parsed = ErrorBodySchema.safeParse(body);
  if (!parsed.success) {
    return new PresignError(fallbackCode, fallbackMessage, status);
  }
  const { code, message, details } = parsed.data.error;
  return new PresignError(code, message, status, details);
}

// =============================================================================
// HTTP Client
// =============================================================================

export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Low-level HTTP client for the Presign relayer API.
 *
 * Every call names the schema of the full response body; a body that
 * does not match fails as INVALID_RESPONSE.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly callerAddress: string | undefined;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: PresignClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.callerAddress = config.callerAddress;
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  get<T>(path: string, schema: ResponseSchema<T>): Promise<PresignResponse<T>> {
    return this.request("GET", path, schema);
  }

  post<T>(path: string, body: unknown, schema: ResponseSchema<T>): Promise<PresignResponse<T>> {
    return this.request("POST", path, schema, body);
  }

  /**
   * Core request method with retry logic.
   *
   * Only GET is retried. A POST that fails on the network or with a 5xx
   * may already have consumed its nonce, so it is attempted once and the
   * caller checks authorization state before resubmitting.
   */
  private async request<T>(
    method: string,
    path: string,
    schema: ResponseSchema<T>,
    body?: unknown,
  ): Promise<PresignResponse<T>> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
      "X-Request-Id": generateRequestId(),
    };

    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    }
    if (this.callerAddress !== undefined) {
      headers["X-Caller-Address"] = this.callerAddress;
    }

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const maxRetries = method === "GET" ? this.maxRetries : 0;
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        if (error instanceof PresignError) {
          throw error;
        }
        // Network errors → retry
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt < maxRetries) {
          await sleep(this.backoff(attempt));
          continue;
        }
        throw new PresignError("NETWORK_ERROR", lastError.message, 0);
      }

      const responseBody = await parseResponseBody(response);

      // 2xx → success
      if (response.ok) {
        const parsed = schema.safeParse(responseBody);
        if (!parsed.success) {
          throw new PresignError(
            "INVALID_RESPONSE",
            `Unexpected response body from ${method} ${path}`,
            response.status,
            parsed.error.issues,
          );
        }
        return { data: parsed.data, status: response.status, headers: extractHeaders(response) };
      }

      // 4xx → don't retry (client errors)
      if (response.status < 500) {
        throw errorFromBody(responseBody, response.status, "CLIENT_ERROR", `HTTP ${response.status}`);
      }

      // 5xx → retry with backoff
      if (attempt < maxRetries) {
        lastError = new PresignError("SERVER_ERROR", `HTTP ${response.status}`, response.status);
        await sleep(this.backoff(attempt));
        continue;
      }

      throw errorFromBody(
        responseBody,
        response.status,
        "SERVER_ERROR",
        `HTTP ${response.status} after ${attempt + 1} ${attempt === 0 ? "attempt" : "attempts"}`,
      );
    }

    throw new PresignError("NETWORK_ERROR", lastError?.message ?? "Request failed after all retries", 0);
  }

  private backoff(attempt: number): number {
    return Math.min(this.retryDelayMs * Math.pow(2, attempt), 10000);
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new PresignError("TIMEOUT", `Request timed out after ${this.timeout}ms`, 0);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
