/**
 * @presign/authorization
 *
 * Replay-safe, time-bounded, single-use execution of signed transfer,
 * receive and cancel authorizations.
 *
 * Provides:
 * - AuthorizationEngine — the three operations and their queries
 * - NonceRegistry — consumed (authorizer, nonce) pairs
 * - UnitOfWork — two-phase commit with an undo log
 * - KeyedLock — per-authorizer serialization
 */

export { AuthorizationEngine, authorizerStream } from "./engine.js";
export type { AuthorizationEngineOptions } from "./engine.js";

export { NonceRegistry } from "./nonce-registry.js";

export { UnitOfWork } from "./unit-of-work.js";
export type { WorkStep } from "./unit-of-work.js";

export { KeyedLock } from "./keyed-lock.js";

export { ManualClock, systemClock, toIsoTimestamp } from "./clock.js";

export type {
  LedgerPort,
  Clock,
  NonceClaim,
  NonceEntry,
  NonceRegistrySnapshot,
  NonceRegistryView,
  AuthorizationOperation,
  AuthorizationReceipt,
  SubmissionContext,
  AuthorizationErrorCode,
} from "./types.js";
export { AuthorizationError } from "./types.js";
