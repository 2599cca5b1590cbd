/**
 * @presign/ledger — Internal types for the token ledger.
 *
 * These extend the shared @presign/types with ledger-specific
 * structures used by the ledger and its callers.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint base units in [0, 2^256)
 * - Fail-closed: invalid movements throw, never silently succeed
 */

import type { Address, TokenMetadata } from "@presign/types";

// ─── Journal Types ───────────────────────────────────────────────────────

/** How value entered or moved within the ledger. */
export type JournalKind = "mint" | "transfer";

/**
 * One recorded balance movement.
 * Mints carry the zero address as `from`.
 */
export interface JournalEntry {
  /** 1-based, gap-free position in the journal */
  readonly sequence: number;
  readonly kind: JournalKind;
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly timestamp: string;
}

/**
 * A completed transfer. Handed back to the caller so it can be reversed
 * while the enclosing unit of work is still open.
 */
export interface TransferRecord extends JournalEntry {
  readonly kind: "transfer";
}

/**
 * Balance for a single holder.
 */
export interface HolderBalance {
  readonly address: Address;
  readonly balance: bigint;
}

/**
 * Filter criteria for querying the journal.
 */
export interface JournalFilter {
  /** Match entries where the account is sender or recipient */
  readonly account?: Address | undefined;
  readonly kind?: JournalKind | undefined;
  readonly fromSequence?: number | undefined;
}

// ─── Options ─────────────────────────────────────────────────────────────

export interface TokenLedgerOptions {
  readonly metadata: TokenMetadata;

  /** ISO timestamp source. Defaults to the wall clock. */
  readonly now?: (() => string) | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "INVALID_METADATA"
  | "SUPPLY_OVERFLOW"
  | "REVERSAL_OUT_OF_ORDER"
  | "SNAPSHOT_MISMATCH";

/**
 * Structured error from the ledger.
 * Always thrown; operations never return error codes.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * A journal entry with its value as a decimal string (JSON-safe).
 */
export interface SerializedJournalEntry {
  readonly sequence: number;
  readonly kind: JournalKind;
  readonly from: Address;
  readonly to: Address;
  readonly value: string;
  readonly timestamp: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 * Balances are derived from the journal on restore and checked against
 * the recorded ones.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly metadata: TokenMetadata;
  readonly totalSupply: string;
  readonly balances: Readonly<Record<Address, string>>;
  readonly journal: readonly SerializedJournalEntry[];
  readonly createdAt: string;
}
