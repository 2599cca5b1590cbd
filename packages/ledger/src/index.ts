/**
 * @presign/ledger
 *
 * In-memory token ledger: balances, supply, a movement journal and
 * LIFO reversal for open units of work.
 *
 * Rules:
 * - Amounts are bigint base units
 * - Balances never go negative
 * - Fail-closed on every invalid movement
 */

// Core
export { TokenLedger } from "./ledger.js";

// Balance book
export { BalanceBook, normalizeAddress, isZeroAddress } from "./accounts.js";

// Arithmetic
export {
  assertAmount,
  checkedAdd,
  parseBaseUnits,
  parseAmount,
  formatAmount,
} from "./money-math.js";

// Types
export type {
  JournalKind,
  JournalEntry,
  TransferRecord,
  HolderBalance,
  JournalFilter,
  TokenLedgerOptions,
  LedgerErrorCode,
  SerializedJournalEntry,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
