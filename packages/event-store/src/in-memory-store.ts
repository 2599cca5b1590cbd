/**
 * @presign/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - A single relayer process whose state lives for the process lifetime
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch, after the append completes
 * - No durability guarantees
 */

import { isDomainEvent } from "@presign/types";
import type { DomainEvent } from "@presign/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  EventStoreOptions,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import type { EventCatalog } from "./catalog.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/**
 * In-memory event store.
 *
 * All events are stored in two data structures:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - Global array for readAll and global subscriptions
 */
export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  /** Per-stream subscribers */
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();

  /** Global subscribers (all streams) */
  private readonly _globalSubscribers = new Set<EventHandler>();

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  private readonly _catalog: EventCatalog | undefined;
  private readonly _now: () => string;
  private readonly _onSubscriberError: (error: unknown, event: StoredEvent) => void;

  constructor(options?: EventStoreOptions) {
    this._catalog = options?.catalog;
    this._now = options?.now ?? (() => new Date().toISOString());
    this._onSubscriberError =
      options?.onSubscriberError ??
      ((error) => {
        queueMicrotask(() => {
          throw error;
        });
      });
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    for (const event of events) {
      this._validateEvent(streamId, event);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    // Nothing below throws
    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now();
    const stored: StoredEvent[] = [];

    for (const [i, event] of events.entries()) {
      const base: UnhashedStoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const record: StoredEvent = { ...base, hash: computeEventHash(base, previousHash), previousHash };
      this._lastHash = record.hash;

      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    }

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
      events: stored,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      (options?.direction ?? "forward") === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const type = options?.type;

    let result =
      (options?.direction ?? "forward") === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    if (type !== undefined) {
      result = result.filter((e) => e.event.type === type);
    }

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Integrity ────────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _validateEvent(streamId: string, event: DomainEvent): void {
    if (!isDomainEvent(event)) {
      throw new EventStoreError("INVALID_EVENT", "Event is not a well-formed DomainEvent", streamId);
    }
    if (this._catalog !== undefined && !this._catalog.validate(event.type, event.payload)) {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Event "${event.type}" is unknown or has an invalid payload`,
        streamId,
      );
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expectedVersion: AppendOptions["expectedVersion"],
  ): void {
    if (expectedVersion === undefined || expectedVersion === "any") {
      return;
    }
    if (expectedVersion === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expectedVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expectedVersion}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];

    for (const handler of handlers) {
      for (const event of events) {
        try {
          handler(event);
        } catch (err) {
          this._onSubscriberError(err, event);
        }
      }
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
