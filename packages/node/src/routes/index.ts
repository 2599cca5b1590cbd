/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAuthorizationRoutes } from "./authorizations.js";
export { createDomainRoutes } from "./domain.js";
export { createAccountRoutes } from "./accounts.js";
export { createEventRoutes } from "./events.js";
export { createMetricsRoute } from "./metrics.js";
