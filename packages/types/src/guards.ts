/**
 * Runtime Type Guards
 *
 * Narrowing functions for Presign domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, replayed events).
 */

import type { Address, Bytes32, Hex, SignatureParts } from "./primitives.js";
import type { AuthorizationKind, NonceConsumption } from "./authorization.js";
import type { TokenMetadata } from "./token.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Primitive guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

/**
 * Shape check only. Checksum validation lives in @presign/typed-data.
 */
export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isBytes32(value: unknown): value is Bytes32 {
  return typeof value === "string" && BYTES32_PATTERN.test(value);
}

export function isSignatureParts(value: unknown): value is SignatureParts {
  if (!isRecord(value)) return false;
  const v = value;
  return (
    typeof v.v === "number" &&
    Number.isInteger(v.v) &&
    isBytes32(v.r) &&
    isBytes32(v.s)
  );
}

// =============================================================================
// Authorization guards
// =============================================================================

const AUTHORIZATION_KINDS = new Set<string>(["transfer", "receive", "cancel"]);
const NONCE_CONSUMPTIONS = new Set<string>(["used", "canceled"]);

export function isAuthorizationKind(value: unknown): value is AuthorizationKind {
  return typeof value === "string" && AUTHORIZATION_KINDS.has(value);
}

export function isNonceConsumption(value: unknown): value is NonceConsumption {
  return typeof value === "string" && NONCE_CONSUMPTIONS.has(value);
}

// =============================================================================
// Token guards
// =============================================================================

export function isTokenMetadata(value: unknown): value is TokenMetadata {
  if (!isRecord(value)) return false;
  const v = value;
  return (
    typeof v.name === "string" &&
    v.name.length > 0 &&
    typeof v.version === "string" &&
    typeof v.symbol === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0 &&
    v.decimals <= 77
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["authorization", "ledger"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  const v = value;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  const v = value;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
