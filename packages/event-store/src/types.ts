/**
 * @presign/event-store — Core types.
 *
 * Defines the interfaces and types for the append-only notification log.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Concurrency control via expected version (optimistic locking)
 * - Every stored event is linked into one global hash chain
 * - Subscriptions enable reactive consumers
 */

import type { DomainEvent, EventMetadata } from "@presign/types";
import type { EventCatalog } from "./catalog.js";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 * - hash / previousHash: link into the global hash chain
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  /** The domain event */
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 over this event's canonical form and `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * The part of a StoredEvent covered by its hash.
 */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check (append regardless)
 */
export type ExpectedVersion = number | "no_stream" | "any";

/**
 * Options for appending events to a stream.
 */
export interface AppendOptions {
  /** Expected version for optimistic concurrency control */
  readonly expectedVersion?: ExpectedVersion;
}

/**
 * Result of an append operation.
 */
export interface AppendResult {
  /** Stream ID the events were appended to */
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  /** Number of events appended */
  readonly count: number;

  /** The events as stored, in append order */
  readonly events: readonly StoredEvent[];
}

// =============================================================================
// Read Options
// =============================================================================

/**
 * Direction for reading events.
 */
export type ReadDirection = "forward" | "backward";

/**
 * Options for reading events from a stream.
 */
export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection;
}

/**
 * Options for reading events across all streams.
 */
export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection;

  /** Only events of this type */
  readonly type?: string;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for event subscriptions.
 */
export type EventHandler = (event: StoredEvent) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  /** Unsubscribe from the stream */
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash verified */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - An append is all-or-nothing: every event is validated before any is stored
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Optimistic concurrency control prevents lost writes
 * - Subscriptions see events in order, after the append has completed
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if validation or the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /**
   * Read events from a single stream.
   * Returns an empty array if the stream doesn't exist.
   */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /**
   * Read events across all streams in global order.
   */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /**
   * Subscribe to new events on a specific stream.
   */
  subscribe(streamId: string, handler: EventHandler): Subscription;

  /**
   * Subscribe to all new events across all streams.
   */
  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Current version of a stream, or 0 if it doesn't exist */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty */
  globalPosition(): number;

  /** Recompute and check the whole hash chain */
  verifyIntegrity(): EventStoreIntegrityResult;
}

/**
 * Options for the in-memory store.
 */
export interface EventStoreOptions {
  /** When set, every appended event must pass catalog validation */
  readonly catalog?: EventCatalog | undefined;

  /** ISO timestamp source for `appendedAt`. Defaults to the wall clock. */
  readonly now?: (() => string) | undefined;

  /**
   * Receives subscriber failures. A failing subscriber never undoes an
   * append. Without this option the failure is rethrown on a later tick.
   */
  readonly onSubscriberError?: ((error: unknown, event: StoredEvent) => void) | undefined;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for EventStore operations.
 */
export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "INVALID_EVENT"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
