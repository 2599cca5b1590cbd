/**
 * @presign/ledger — Token ledger.
 *
 * In-memory balances for one token, with a journal of every movement.
 * This is the collaborator the authorization engine moves value through.
 *
 * API surface:
 * - mint() — Create supply for a holder
 * - transfer() — Move value between holders
 * - assertTransferable() — Dry-run the checks transfer() performs
 * - reverseTransfer() — Undo the most recent transfer (open unit of work only)
 * - balanceOf() / totalSupply / holders() — Queries
 * - journal() — Query movements with optional filters
 * - snapshot() / fromSnapshot() — Persistence
 *
 * Committed movements are never edited. A reversal exists only so an
 * enclosing unit of work can roll back before it commits.
 */

import { isTokenMetadata, ZERO_ADDRESS } from "@presign/types";
import type { Address, TokenMetadata } from "@presign/types";
import { BalanceBook, isZeroAddress, normalizeAddress } from "./accounts.js";
import { assertAmount, checkedAdd, parseBaseUnits } from "./money-math.js";
import type {
  HolderBalance,
  JournalEntry,
  JournalFilter,
  LedgerSnapshot,
  SerializedJournalEntry,
  TokenLedgerOptions,
  TransferRecord,
} from "./types.js";
import { LedgerError } from "./types.js";

export class TokenLedger {
  private readonly _metadata: TokenMetadata;
  private readonly _now: () => string;
  private readonly _balances: BalanceBook = new BalanceBook();
  private readonly _journal: JournalEntry[] = [];
  private _totalSupply = 0n;

  constructor(options: TokenLedgerOptions) {
    if (!isTokenMetadata(options.metadata)) {
      throw new LedgerError("INVALID_METADATA", "Token metadata is malformed");
    }
    this._metadata = { ...options.metadata };
    this._now = options.now ?? (() => new Date().toISOString());
  }

  get metadata(): TokenMetadata {
    return this._metadata;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Create `value` new units for `to`.
   */
  mint(to: Address, value: bigint, timestamp?: string): JournalEntry {
    assertAmount(value);
    if (value === 0n) {
      throw new LedgerError("INVALID_AMOUNT", "Mint amount must be positive");
    }
    if (isZeroAddress(to)) {
      throw new LedgerError("INVALID_ADDRESS", "Cannot mint to the zero address");
    }

    const supply = checkedAdd(this._totalSupply, value);
    this._balances.credit(to, value);
    this._totalSupply = supply;

    return this._record("mint", ZERO_ADDRESS, to, value, timestamp);
  }

  /**
   * Check every precondition of transfer() without moving value.
   *
   * Validation rules (fail-closed):
   * 1. Both addresses well-formed
   * 2. Neither party is the zero address
   * 3. Value is a uint256
   * 4. Sender balance covers value
   */
  assertTransferable(from: Address, to: Address, value: bigint): void {
    if (isZeroAddress(from)) {
      throw new LedgerError("INVALID_ADDRESS", "Cannot transfer from the zero address");
    }
    if (isZeroAddress(to)) {
      throw new LedgerError("INVALID_ADDRESS", "Cannot transfer to the zero address");
    }
    assertAmount(value);

    const balance = this._balances.get(from);
    if (balance < value) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance for ${normalizeAddress(from)}: has ${balance.toString()}, needs ${value.toString()}`,
      );
    }
  }

  /**
   * Move `value` from `from` to `to`. Zero-value and self transfers are
   * allowed and still journaled.
   */
  transfer(from: Address, to: Address, value: bigint, timestamp?: string): TransferRecord {
    this.assertTransferable(from, to, value);

    this._balances.debit(from, value);
    this._balances.credit(to, value);

    const entry = this._record("transfer", from, to, value, timestamp);
    return { ...entry, kind: "transfer" };
  }

  /**
   * Undo a transfer. Only the most recent journal entry can be reversed,
   * which keeps reversals in strict LIFO order with the unit of work.
   */
  reverseTransfer(record: TransferRecord): void {
    const last = this._journal[this._journal.length - 1];
    if (last === undefined || last.sequence !== record.sequence || last.kind !== "transfer") {
      throw new LedgerError(
        "REVERSAL_OUT_OF_ORDER",
        `Transfer #${String(record.sequence)} is not the most recent journal entry`,
      );
    }

    this._balances.debit(last.to, last.value);
    this._balances.credit(last.from, last.value);
    this._journal.pop();
  }

  private _record(
    kind: JournalEntry["kind"],
    from: Address,
    to: Address,
    value: bigint,
    timestamp?: string,
  ): JournalEntry {
    const entry: JournalEntry = {
      sequence: this._journal.length + 1,
      kind,
      from: normalizeAddress(from),
      to: normalizeAddress(to),
      value,
      timestamp: timestamp ?? this._now(),
    };
    this._journal.push(entry);
    return entry;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this._balances.get(account);
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  holders(): readonly HolderBalance[] {
    return this._balances.holders();
  }

  journal(filter?: JournalFilter): readonly JournalEntry[] {
    if (filter === undefined) {
      return [...this._journal];
    }

    const account = filter.account === undefined ? undefined : normalizeAddress(filter.account);
    return this._journal.filter((entry) => {
      if (account !== undefined && entry.from !== account && entry.to !== account) {
        return false;
      }
      if (filter.kind !== undefined && entry.kind !== filter.kind) {
        return false;
      }
      if (filter.fromSequence !== undefined && entry.sequence < filter.fromSequence) {
        return false;
      }
      return true;
    });
  }

  get journalLength(): number {
    return this._journal.length;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const balances: Record<Address, string> = {};
    for (const holder of this._balances.holders()) {
      balances[holder.address] = holder.balance.toString();
    }

    return {
      version: 1,
      metadata: this._metadata,
      totalSupply: this._totalSupply.toString(),
      balances,
      journal: this._journal.map(serializeEntry),
      createdAt: this._now(),
    };
  }

  /**
   * Restore a ledger by replaying its journal with full validation.
   * The replayed balances and supply must match the recorded ones.
   */
  static fromSnapshot(snapshot: LedgerSnapshot, options?: Pick<TokenLedgerOptions, "now">): TokenLedger {
    const ledger = new TokenLedger({ metadata: snapshot.metadata, now: options?.now });

    for (const entry of snapshot.journal) {
      const value = parseBaseUnits(entry.value);
      if (entry.kind === "mint") {
        ledger.mint(entry.to, value, entry.timestamp);
      } else {
        ledger.transfer(entry.from, entry.to, value, entry.timestamp);
      }
    }

    if (ledger.totalSupply.toString() !== snapshot.totalSupply) {
      throw new LedgerError(
        "SNAPSHOT_MISMATCH",
        `Replayed supply ${ledger.totalSupply.toString()} does not match recorded ${snapshot.totalSupply}`,
      );
    }

    const recorded = Object.entries(snapshot.balances);
    if (recorded.length !== ledger._balances.count) {
      throw new LedgerError("SNAPSHOT_MISMATCH", "Replayed holder set does not match recorded balances");
    }
    for (const [address, balance] of recorded) {
      if (ledger._balances.get(normalizeAddressString(address)).toString() !== balance) {
        throw new LedgerError("SNAPSHOT_MISMATCH", `Replayed balance for ${address} does not match`);
      }
    }

    return ledger;
  }
}

function serializeEntry(entry: JournalEntry): SerializedJournalEntry {
  return { ...entry, value: entry.value.toString() };
}

function normalizeAddressString(address: string): Address {
  if (!address.startsWith("0x")) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid address: "${address}"`);
  }
  return normalizeAddress(`0x${address.slice(2)}`);
}
