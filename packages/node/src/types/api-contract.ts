/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { RelayService } from "../services/relay-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The relay service (set by createApp) */
    service: RelayService;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  };
}

/**
 * Environment contributed by validateBody(): the parsed request body.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}
