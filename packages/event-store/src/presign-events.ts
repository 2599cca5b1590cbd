/**
 * @presign/event-store — Presign domain event definitions.
 *
 * Naming convention: `<source>.<action>`
 *
 * Payload rules:
 * - Addresses are 0x-prefixed, 20 bytes
 * - Nonces are 0x-prefixed, 32 bytes
 * - Amounts are base-unit decimal strings
 */

import { isAddress, isBytes32 } from "@presign/types";
import type { Address, Bytes32 } from "@presign/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payloads
// =============================================================================

export interface AuthorizationUsedPayload {
  readonly authorizer: Address;
  readonly nonce: Bytes32;
  /** Which signed message consumed the nonce */
  readonly kind: "transfer" | "receive";
}

export interface AuthorizationCanceledPayload {
  readonly authorizer: Address;
  readonly nonce: Bytes32;
}

export interface TransferPayload {
  readonly from: Address;
  readonly to: Address;
  readonly value: string;
}

export interface MintPayload {
  readonly to: Address;
  readonly value: string;
}

// =============================================================================
// Event Types
// =============================================================================

export const PRESIGN_EVENTS = {
  AUTHORIZATION_USED: "authorization.used",
  AUTHORIZATION_CANCELED: "authorization.canceled",
  LEDGER_TRANSFER: "ledger.transfer",
  LEDGER_MINT: "ledger.mint",
} as const;

export type PresignEventType = (typeof PRESIGN_EVENTS)[keyof typeof PRESIGN_EVENTS];

// =============================================================================
// Validators
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isAmount(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

export function isAuthorizationUsedPayload(value: unknown): value is AuthorizationUsedPayload {
  return (
    isRecord(value) &&
    isAddress(value.authorizer) &&
    isBytes32(value.nonce) &&
    (value.kind === "transfer" || value.kind === "receive")
  );
}

export function isAuthorizationCanceledPayload(value: unknown): value is AuthorizationCanceledPayload {
  return isRecord(value) && isAddress(value.authorizer) && isBytes32(value.nonce);
}

export function isTransferPayload(value: unknown): value is TransferPayload {
  return isRecord(value) && isAddress(value.from) && isAddress(value.to) && isAmount(value.value);
}

export function isMintPayload(value: unknown): value is MintPayload {
  return isRecord(value) && isAddress(value.to) && isAmount(value.value);
}

const SCHEMAS: readonly EventSchema[] = [
  {
    type: PRESIGN_EVENTS.AUTHORIZATION_USED,
    description: "A transfer or receive authorization consumed its nonce",
    source: "authorization",
    validate: isAuthorizationUsedPayload,
  },
  {
    type: PRESIGN_EVENTS.AUTHORIZATION_CANCELED,
    description: "An authorizer burned a nonce without moving value",
    source: "authorization",
    validate: isAuthorizationCanceledPayload,
  },
  {
    type: PRESIGN_EVENTS.LEDGER_TRANSFER,
    description: "Value moved between two holders",
    source: "ledger",
    validate: isTransferPayload,
  },
  {
    type: PRESIGN_EVENTS.LEDGER_MINT,
    description: "New supply was created for a holder",
    source: "ledger",
    validate: isMintPayload,
  },
];

/**
 * A catalog with every Presign event type registered.
 */
export function createPresignCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
