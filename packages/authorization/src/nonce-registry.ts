/**
 * @presign/authorization — Nonce registry.
 *
 * Records which (authorizer, nonce) pairs have been consumed and how.
 *
 * Rules:
 * - Nonces are scoped per authorizer; two signers may use the same value
 * - A consumed nonce is never reset once its unit of work commits
 * - Addresses and nonces are matched case-insensitively
 *
 * API surface:
 * - isUsed() / get() / entries() — Queries
 * - markUsed() — Consume a nonce; the returned claim can release it
 * - view() — Read-only facade handed to callers
 * - snapshot() / fromSnapshot() / fromEvents() — Persistence and replay
 */

import { getAddress, isAddress } from "viem";
import { isBytes32, isNonceConsumption } from "@presign/types";
import type { Address, Bytes32, NonceConsumption } from "@presign/types";
import {
  PRESIGN_EVENTS,
  isAuthorizationCanceledPayload,
  isAuthorizationUsedPayload,
} from "@presign/event-store";
import type { StoredEvent } from "@presign/event-store";
import type { NonceClaim, NonceEntry, NonceRegistrySnapshot, NonceRegistryView } from "./types.js";
import { AuthorizationError } from "./types.js";

export class NonceRegistry {
  private readonly _entries = new Map<string, NonceEntry>();

  // ─── Queries ─────────────────────────────────────────────────────────

  isUsed(authorizer: Address, nonce: Bytes32): boolean {
    return this._entries.has(entryKey(authorizer, nonce));
  }

  get(authorizer: Address, nonce: Bytes32): NonceEntry | undefined {
    return this._entries.get(entryKey(authorizer, nonce));
  }

  /**
   * Consumed entries in consumption order, optionally for one authorizer.
   */
  entries(authorizer?: Address): readonly NonceEntry[] {
    const all = [...this._entries.values()];
    if (authorizer === undefined) {
      return all;
    }
    const owner = normalizeAuthorizer(authorizer);
    return all.filter((e) => e.authorizer === owner);
  }

  get size(): number {
    return this._entries.size;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Throw AUTHORIZATION_ALREADY_USED if the pair is consumed.
   */
  assertUnused(authorizer: Address, nonce: Bytes32): void {
    const existing = this.get(authorizer, nonce);
    if (existing !== undefined) {
      throw new AuthorizationError(
        "AUTHORIZATION_ALREADY_USED",
        `Authorization ${existing.nonce} of ${existing.authorizer} is already ${existing.consumption}`,
      );
    }
  }

  /**
   * Consume a nonce. The claim's `release` removes this entry again and is
   * meant as the undo of an uncommitted unit of work; there is no other
   * way to reset a consumed pair.
   */
  markUsed(
    authorizer: Address,
    nonce: Bytes32,
    consumption: NonceConsumption,
    consumedAt: string,
  ): NonceClaim {
    this.assertUnused(authorizer, nonce);

    const key = entryKey(authorizer, nonce);
    const entry: NonceEntry = {
      authorizer: normalizeAuthorizer(authorizer),
      nonce: normalizeNonce(nonce),
      consumption,
      consumedAt,
    };
    this._entries.set(key, entry);

    return {
      entry,
      release: () => {
        if (this._entries.get(key) === entry) {
          this._entries.delete(key);
        }
      },
    };
  }

  view(): NonceRegistryView {
    const registry = this;
    return Object.freeze({
      isUsed: (authorizer: Address, nonce: Bytes32) => registry.isUsed(authorizer, nonce),
      get: (authorizer: Address, nonce: Bytes32) => registry.get(authorizer, nonce),
      entries: (authorizer?: Address) => registry.entries(authorizer),
      get size() {
        return registry.size;
      },
      snapshot: () => registry.snapshot(),
    });
  }

  // ─── Snapshot / Replay ───────────────────────────────────────────────

  snapshot(): NonceRegistrySnapshot {
    return { version: 1, entries: [...this._entries.values()] };
  }

  static fromSnapshot(snapshot: NonceRegistrySnapshot): NonceRegistry {
    const registry = new NonceRegistry();
    for (const entry of snapshot.entries) {
      if (!isNonceConsumption(entry.consumption)) {
        throw new AuthorizationError(
          "INVALID_AUTHORIZATION",
          `Snapshot entry has unknown consumption "${String(entry.consumption)}"`,
        );
      }
      registry.markUsed(entry.authorizer, entry.nonce, entry.consumption, entry.consumedAt);
    }
    return registry;
  }

  /**
   * Rebuild the registry from the notification log.
   * Events other than authorization.used / authorization.canceled are skipped.
   */
  static fromEvents(events: readonly StoredEvent[]): NonceRegistry {
    const registry = new NonceRegistry();
    for (const { event } of events) {
      const payload: unknown = event.payload;
      if (event.type === PRESIGN_EVENTS.AUTHORIZATION_USED && isAuthorizationUsedPayload(payload)) {
        registry.markUsed(payload.authorizer, payload.nonce, "used", event.metadata.timestamp);
      } else if (
        event.type === PRESIGN_EVENTS.AUTHORIZATION_CANCELED &&
        isAuthorizationCanceledPayload(payload)
      ) {
        registry.markUsed(payload.authorizer, payload.nonce, "canceled", event.metadata.timestamp);
      }
    }
    return registry;
  }
}

// ─── Keys ────────────────────────────────────────────────────────────────

function normalizeAuthorizer(authorizer: Address): Address {
  if (!isAddress(authorizer, { strict: false })) {
    throw new AuthorizationError("INVALID_AUTHORIZATION", `Invalid authorizer address: ${authorizer}`);
  }
  return getAddress(authorizer);
}

function normalizeNonce(nonce: Bytes32): Bytes32 {
  if (!isBytes32(nonce)) {
    throw new AuthorizationError("INVALID_AUTHORIZATION", `Nonce must be 32 bytes: ${nonce}`);
  }
  return `0x${nonce.slice(2).toLowerCase()}`;
}

function entryKey(authorizer: Address, nonce: Bytes32): string {
  return `${normalizeAuthorizer(authorizer).toLowerCase()}:${normalizeNonce(nonce)}`;
}
