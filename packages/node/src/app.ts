/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { RelayService } from "./services/relay-service.js";
import type { AuthorizationOutcome, RelayServiceConfig } from "./services/relay-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { anonymousAuthMiddleware, authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { rateLimitMiddleware, TokenBucketStore } from "./middleware/rate-limit.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAuthorizationRoutes } from "./routes/authorizations.js";
import { createDomainRoutes } from "./routes/domain.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEventRoutes } from "./routes/events.js";
import { createMetricsRoute } from "./routes/metrics.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: Omit<RelayServiceConfig, "onOutcome">;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives every authorization outcome, after metrics are counted */
  readonly outcomeFn?: (outcome: AuthorizationOutcome) => void;
  /** Auth configuration. When omitted, requests run as an anonymous operator. */
  readonly auth?: AuthConfig;
  /** Rate limit configuration. Applies only together with auth. */
  readonly rateLimit?: { rpm: number; burst: number };
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: RelayService;
  readonly metricsCollector: MetricsCollector;
  readonly rateLimitStore?: TokenBucketStore | undefined;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const metricsCollector = new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;
  const outcomeFn = options.outcomeFn;

  const service = new RelayService({
    ...options.serviceConfig,
    onOutcome: (outcome) => {
      if (enableMetrics) {
        metricsCollector.recordOutcome(outcome);
      }
      outcomeFn?.(outcome);
    },
  });

  let rateLimitStore: TokenBucketStore | undefined;
  if (options.auth !== undefined && options.rateLimit !== undefined) {
    rateLimitStore = new TokenBucketStore(options.rateLimit);
  }

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── Metrics Route (no auth for Prometheus scraping) ────────────
  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
    if (rateLimitStore !== undefined) {
      app.use("/api/*", rateLimitMiddleware(rateLimitStore));
    }
  } else {
    // Unsecured mode (tests, dev)
    app.use("/api/*", anonymousAuthMiddleware());
  }

  app.route("/api/v1", createDomainRoutes());
  app.route("/api/v1/authorizations", createAuthorizationRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service, metricsCollector, rateLimitStore };
}
