/**
 * @presign/authorization — Types for the authorization engine.
 *
 * Rules:
 * - All types are readonly
 * - Every rejection is an AuthorizationError with a distinguishable code,
 *   except ledger failures, which propagate as LedgerError unchanged
 * - A nonce, once consumed, is never reset
 */

import type { Address, Bytes32, NonceConsumption } from "@presign/types";
import type { TransferRecord } from "@presign/ledger";
import type { StoredEvent } from "@presign/event-store";

// ─── Ports ───────────────────────────────────────────────────────────────

/**
 * The ledger operations the engine depends on.
 * `reverseTransfer` undoes the most recent transfer of an open unit of work.
 */
export interface LedgerPort {
  balanceOf(account: Address): bigint;
  transfer(from: Address, to: Address, value: bigint): TransferRecord;
  reverseTransfer(record: TransferRecord): void;
}

/**
 * Source of the current time in unix seconds.
 */
export interface Clock {
  now(): bigint;
}

// ─── Nonce Registry ──────────────────────────────────────────────────────

/**
 * A consumed (authorizer, nonce) pair.
 */
export interface NonceEntry {
  readonly authorizer: Address;
  readonly nonce: Bytes32;
  readonly consumption: NonceConsumption;
  /** ISO 8601 */
  readonly consumedAt: string;
}

/**
 * A nonce consumed by markUsed(). `release` undoes exactly that write and
 * is only handed to the unit of work that made it.
 */
export interface NonceClaim {
  readonly entry: NonceEntry;
  release(): void;
}

/**
 * Read-only access to a registry.
 */
export interface NonceRegistryView {
  isUsed(authorizer: Address, nonce: Bytes32): boolean;
  get(authorizer: Address, nonce: Bytes32): NonceEntry | undefined;
  entries(authorizer?: Address): readonly NonceEntry[];
  readonly size: number;
  snapshot(): NonceRegistrySnapshot;
}

export interface NonceRegistrySnapshot {
  readonly version: 1;
  readonly entries: readonly NonceEntry[];
}

// ─── Engine ──────────────────────────────────────────────────────────────

export type AuthorizationOperation = "transfer" | "receive" | "cancel";

/**
 * What a successful operation did. `events` are the notifications as
 * stored, in emission order.
 */
export interface AuthorizationReceipt {
  readonly operation: AuthorizationOperation;
  readonly authorizer: Address;
  readonly nonce: Bytes32;
  readonly correlationId: string;
  readonly transfer?: {
    readonly from: Address;
    readonly to: Address;
    readonly value: bigint;
  };
  readonly events: readonly StoredEvent[];
}

/**
 * Who submitted an operation. Recorded as the event actor.
 */
export interface SubmissionContext {
  readonly actor?: string | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for authorization operations. */
export type AuthorizationErrorCode =
  | "INVALID_AUTHORIZATION"
  | "INVALID_SIGNATURE"
  | "AUTHORIZATION_NOT_YET_VALID"
  | "AUTHORIZATION_EXPIRED"
  | "AUTHORIZATION_ALREADY_USED"
  | "CALLER_NOT_PAYEE"
  | "UNIT_ALREADY_COMMITTED"
  | "ROLLBACK_FAILED";

/**
 * Structured error from the authorization engine.
 */
export class AuthorizationError extends Error {
  public readonly code: AuthorizationErrorCode;

  constructor(code: AuthorizationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthorizationError";
    this.code = code;
  }
}
