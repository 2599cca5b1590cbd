/**
 * Request log entries.
 *
 * One entry per request goes to an injected sink; main.ts hands them to
 * pino at the entry's level and tests usually pass no sink at all.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { matchRoute } from "./metrics.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly level: RequestLogLevel;
  readonly method: string;
  /** Route template; raw paths carry addresses and nonces */
  readonly route: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

/**
 * Rejected submissions are routine for a relayer and log as warnings;
 * only 5xx responses are errors.
 */
export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(log: (entry: RequestLogEntry) => void): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();

    log({
      level: levelForStatus(c.res.status),
      method: c.req.method,
      route: matchRoute(c.req.method, c.req.path),
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
    });
  };
}
