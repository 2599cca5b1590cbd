/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, domainErrorCode, statusForCode } from "./error-handler.js";
export { acceptRequestId, requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { levelForStatus, loggerMiddleware } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  authMiddleware,
  anonymousAuthMiddleware,
  requirePermission,
  verifyJwt,
  signJwt,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { rateLimitMiddleware, rateLimitKey, TokenBucketStore } from "./rate-limit.js";
export type { RateDecision, RateLimitConfig } from "./rate-limit.js";
export {
  metricsMiddleware,
  matchRoute,
  MetricsCollector,
  PROMETHEUS_CONTENT_TYPE,
  RELAY_ROUTES,
  UNMATCHED_ROUTE,
} from "./metrics.js";
