/**
 * @presign/event-store — Append-only notification log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a global SHA-256 hash chain
 * - EventCatalog for payload validation
 * - Presign domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreOptions,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Presign domain events
export {
  PRESIGN_EVENTS,
  createPresignCatalog,
  isAuthorizationUsedPayload,
  isAuthorizationCanceledPayload,
  isTransferPayload,
  isMintPayload,
} from "./presign-events.js";
export type {
  PresignEventType,
  AuthorizationUsedPayload,
  AuthorizationCanceledPayload,
  TransferPayload,
  MintPayload,
} from "./presign-events.js";
