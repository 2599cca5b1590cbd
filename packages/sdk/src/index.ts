/**
 * @presign/sdk — Typed HTTP client SDK for a Presign relayer.
 *
 * Uses native fetch; responses are checked with zod before they
 * reach the caller.
 *
 * @packageDocumentation
 */

// Types
export type { PresignClientConfig, PresignResponse } from "./types.js";
export { PresignError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";
export type { ResponseSchema } from "./http-client.js";

// Client
export {
  PresignClient,
  AuthorizationsNamespace,
  DomainNamespace,
  AccountsNamespace,
  EventsNamespace,
} from "./client.js";
export type { ListEventsParams } from "./client.js";

// Response shapes
export type {
  AuthorizationState,
  Balance,
  Domain,
  EventPage,
  Health,
  NotificationEvent,
  Receipt,
  TypeHashes,
} from "./schemas.js";
export { envelope } from "./schemas.js";
