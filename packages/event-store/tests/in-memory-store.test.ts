/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position, stored result
 * - Concurrency: expected version, no_stream, any
 * - Read: forward, backward, from version, max count
 * - ReadAll: global ordering, from position, max count, type filter
 * - Subscriptions: stream-specific, global, unsubscribe, failing handlers
 * - Validation: malformed events, catalog rejection, all-or-nothing
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@presign/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { createPresignCatalog } from "../src/presign-events.js";
import { EventStoreError } from "../src/types.js";
import type { StoredEvent } from "../src/types.js";
import { TS, makeEvent, makeEvents } from "./helpers.js";

const SIGNER = "0x1111111111111111111111111111111111111111";
const NONCE = `0x${"ab".repeat(32)}`;

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();
    const result = store.append("stream-1", [makeEvent("test.created")]);

    expect(result.streamId).toBe("stream-1");
    expect(result.fromVersion).toBe(1);
    expect(result.toVersion).toBe(1);
    expect(result.count).toBe(1);
    expect(result.events).toHaveLength(1);
  });

  it("returns the stored events with positions and hashes", () => {
    const store = new InMemoryEventStore({ now: () => TS });
    const result = store.append("stream-1", makeEvents(2));

    expect(result.events.map((e) => e.globalPosition)).toEqual([1, 2]);
    expect(result.events[0]?.appendedAt).toBe(TS);
    expect(result.events[0]?.previousHash).toBe("genesis");
    expect(result.events[1]?.previousHash).toBe(result.events[0]?.hash);
  });

  it("assigns monotonically increasing versions within a stream", () => {
    const store = new InMemoryEventStore();
    store.append("stream-1", makeEvents(2));
    store.append("stream-1", makeEvents(3));

    expect(store.read("stream-1").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(1));
    store.append("b", makeEvents(2));
    store.append("a", makeEvents(1));

    expect(store.readAll().map((e) => `${e.streamId}:${e.globalPosition}`)).toEqual([
      "a:1",
      "b:2",
      "b:3",
      "a:4",
    ]);
    expect(store.globalPosition()).toBe(4);
  });

  it("rejects an empty append", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("s", [])).toThrow(EventStoreError);
  });

  it("rejects an empty stream id", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("", makeEvents(1))).toThrow("Stream ID must be a non-empty string");
  });

  it("rejects a malformed event without storing any of the batch", () => {
    const store = new InMemoryEventStore();
    const bad: DomainEvent = JSON.parse('{"type":"bad","metadata":{"source":"vault"},"payload":{}}');

    try {
      store.append("s", [makeEvent("good"), bad]);
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      expect((err as EventStoreError).code).toBe("INVALID_EVENT");
    }
    expect(store.globalPosition()).toBe(0);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expected version", () => {
  it("accepts a matching version", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(2));
    expect(store.append("s", makeEvents(1), { expectedVersion: 2 }).toVersion).toBe(3);
  });

  it("rejects a stale version", () => {
    const store = new InMemoryEventStore();
    store.append("my-stream", makeEvents(2));

    try {
      store.append("my-stream", makeEvents(1), { expectedVersion: 1 });
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      const storeErr = err as EventStoreError;
      expect(storeErr.code).toBe("CONCURRENCY_CONFLICT");
      expect(storeErr.streamId).toBe("my-stream");
    }
  });

  it("enforces no_stream", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(1), { expectedVersion: "no_stream" });
    expect(() => store.append("s", makeEvents(1), { expectedVersion: "no_stream" })).toThrow(
      'Stream "s" already exists (version 1), expected no_stream',
    );
  });

  it("skips the check for any", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(3));
    expect(store.append("s", makeEvents(1), { expectedVersion: "any" }).toVersion).toBe(4);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  const store = new InMemoryEventStore();
  store.append("s", makeEvents(5));

  it("returns an empty array for unknown streams", () => {
    expect(store.read("missing")).toEqual([]);
  });

  it("reads forward from a version", () => {
    expect(store.read("s", { fromVersion: 3 }).map((e) => e.version)).toEqual([3, 4, 5]);
  });

  it("reads backward from a version", () => {
    expect(store.read("s", { fromVersion: 3, direction: "backward" }).map((e) => e.version)).toEqual([3, 2, 1]);
  });

  it("limits the count", () => {
    expect(store.read("s", { maxCount: 2 }).map((e) => e.version)).toEqual([1, 2]);
  });

  it("rejects fromVersion below 1", () => {
    expect(() => store.read("s", { fromVersion: 0 })).toThrow("fromVersion must be >= 1, got 0");
  });
});

describe("readAll", () => {
  it("filters by type and position", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("x"), makeEvent("y"), makeEvent("x")]);

    expect(store.readAll({ type: "x" }).map((e) => e.globalPosition)).toEqual([1, 3]);
    expect(store.readAll({ fromPosition: 2, maxCount: 1 }).map((e) => e.globalPosition)).toEqual([2]);
    expect(store.readAll({ direction: "backward", fromPosition: 3 }).map((e) => e.globalPosition)).toEqual([
      3, 2, 1,
    ]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events in order", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn<(event: StoredEvent) => void>();
    store.subscribe("s", handler);

    store.append("s", makeEvents(2));
    store.append("other", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map(([e]) => e.version)).toEqual([1, 2]);
  });

  it("delivers every stream to global subscribers", () => {
    const store = new InMemoryEventStore();
    const seen: number[] = [];
    store.subscribeAll((e) => seen.push(e.globalPosition));

    store.append("a", makeEvents(1));
    store.append("b", makeEvents(1));

    expect(seen).toEqual([1, 2]);
  });

  it("stops after unsubscribe", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const sub = store.subscribe("s", handler);
    sub.unsubscribe();

    store.append("s", makeEvents(1));
    expect(handler).not.toHaveBeenCalled();
  });

  it("reports failing subscribers without undoing the append", () => {
    const onSubscriberError = vi.fn();
    const store = new InMemoryEventStore({ onSubscriberError });
    const after = vi.fn();
    store.subscribeAll(() => {
      throw new Error("boom");
    });
    store.subscribeAll(after);

    const result = store.append("s", makeEvents(1));

    expect(result.count).toBe(1);
    expect(store.globalPosition()).toBe(1);
    expect(onSubscriberError).toHaveBeenCalledTimes(1);
    expect(onSubscriberError.mock.calls[0]?.[0]).toEqual(new Error("boom"));
    expect(after).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// Catalog validation
// =============================================================================

describe("catalog validation", () => {
  it("accepts registered events with valid payloads", () => {
    const store = new InMemoryEventStore({ catalog: createPresignCatalog() });
    const result = store.append(`authorizer:${SIGNER}`, [
      makeEvent("authorization.used", { authorizer: SIGNER, nonce: NONCE, kind: "transfer" }),
    ]);
    expect(result.count).toBe(1);
  });

  it("rejects unknown event types", () => {
    const store = new InMemoryEventStore({ catalog: createPresignCatalog() });
    expect(() => store.append("s", [makeEvent("vault.intent.declared")])).toThrow(
      'Event "vault.intent.declared" is unknown or has an invalid payload',
    );
  });

  it("rejects invalid payloads", () => {
    const store = new InMemoryEventStore({ catalog: createPresignCatalog() });
    expect(() =>
      store.append("ledger", [makeEvent("ledger.transfer", { from: SIGNER, to: SIGNER, value: 7 }, "ledger")]),
    ).toThrow(EventStoreError);
  });
});

describe("query", () => {
  it("reports stream existence and version", () => {
    const store = new InMemoryEventStore();
    expect(store.streamExists("s")).toBe(false);
    expect(store.streamVersion("s")).toBe(0);

    store.append("s", makeEvents(2));
    expect(store.streamExists("s")).toBe(true);
    expect(store.streamVersion("s")).toBe(2);
  });
});
