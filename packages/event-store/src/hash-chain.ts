/**
 * @presign/event-store — Hash chain for tamper-evident notification logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Canonical content of an event for hashing: the event body plus its
 * store position. `appendedAt` is included because it is part of the
 * persisted record.
 */
function canonicalEventContent(event: UnhashedStoredEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * SHA-256 of an event given its predecessor's hash, hex-encoded.
 */
export function computeEventHash(
  event: UnhashedStoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify the hash chain of a sequence of events.
 *
 * Events must be the full log in global position order, starting at
 * position 1.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;
  let expectedPosition = 1;

  for (const event of events) {
    if (event.globalPosition !== expectedPosition) {
      errors.push({
        position: event.globalPosition,
        reason: `Gap in global positions: expected ${expectedPosition}, got ${event.globalPosition}`,
      });
    }
    expectedPosition = event.globalPosition + 1;

    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    } else if (errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }

    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
