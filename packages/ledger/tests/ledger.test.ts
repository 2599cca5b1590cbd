/**
 * Tests for the TokenLedger.
 *
 * Covers:
 * - Metadata validation
 * - Minting and supply accounting
 * - Transfers, zero-value and self transfers
 * - Insufficient balance and address validation
 * - LIFO reversal
 * - Journal queries
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address, TokenMetadata } from "@presign/types";
import { ZERO_ADDRESS } from "@presign/types";
import { TokenLedger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2024-01-15T10:00:00.000Z";

const METADATA: TokenMetadata = { name: "Presign Dollar", version: "1", symbol: "PUSD", decimals: 6 };

const ALICE: Address = "0x1111111111111111111111111111111111111111";
const BOB: Address = "0x2222222222222222222222222222222222222222";
const CAROL: Address = "0x3333333333333333333333333333333333333333";

function newLedger(): TokenLedger {
  return new TokenLedger({ metadata: METADATA, now: () => TS });
}

function expectLedgerError(fn: () => unknown, code: LedgerError["code"]): void {
  try {
    fn();
    expect.fail("Should have thrown");
  } catch (err) {
    expect(err).toBeInstanceOf(LedgerError);
    expect((err as LedgerError).code).toBe(code);
  }
}

// ─── Construction ────────────────────────────────────────────────────────

describe("TokenLedger construction", () => {
  it("exposes its metadata", () => {
    expect(newLedger().metadata).toEqual(METADATA);
  });

  it("rejects malformed metadata", () => {
    expectLedgerError(
      () => new TokenLedger({ metadata: { ...METADATA, decimals: -1 } }),
      "INVALID_METADATA",
    );
  });

  it("starts empty", () => {
    const ledger = newLedger();
    expect(ledger.totalSupply).toBe(0n);
    expect(ledger.holders()).toEqual([]);
    expect(ledger.journalLength).toBe(0);
  });
});

// ─── Mint ────────────────────────────────────────────────────────────────

describe("mint", () => {
  let ledger: TokenLedger;

  beforeEach(() => {
    ledger = newLedger();
  });

  it("credits the holder and grows supply", () => {
    const entry = ledger.mint(ALICE, 10_000_000n);
    expect(ledger.balanceOf(ALICE)).toBe(10_000_000n);
    expect(ledger.totalSupply).toBe(10_000_000n);
    expect(entry).toEqual({
      sequence: 1,
      kind: "mint",
      from: ZERO_ADDRESS,
      to: ALICE,
      value: 10_000_000n,
      timestamp: TS,
    });
  });

  it("rejects a zero mint", () => {
    expectLedgerError(() => ledger.mint(ALICE, 0n), "INVALID_AMOUNT");
  });

  it("rejects minting to the zero address", () => {
    expectLedgerError(() => ledger.mint(ZERO_ADDRESS, 1n), "INVALID_ADDRESS");
  });

  it("rejects supply beyond uint256", () => {
    ledger.mint(ALICE, (1n << 256n) - 1n);
    expectLedgerError(() => ledger.mint(BOB, 1n), "SUPPLY_OVERFLOW");
    expect(ledger.balanceOf(BOB)).toBe(0n);
  });
});

// ─── Transfer ────────────────────────────────────────────────────────────

describe("transfer", () => {
  let ledger: TokenLedger;

  beforeEach(() => {
    ledger = newLedger();
    ledger.mint(ALICE, 10_000_000n);
  });

  it("moves value and preserves supply", () => {
    const record = ledger.transfer(ALICE, BOB, 7_000_000n);
    expect(ledger.balanceOf(ALICE)).toBe(3_000_000n);
    expect(ledger.balanceOf(BOB)).toBe(7_000_000n);
    expect(ledger.totalSupply).toBe(10_000_000n);
    expect(record).toMatchObject({ sequence: 2, kind: "transfer", from: ALICE, to: BOB, value: 7_000_000n });
  });

  it("allows transferring the entire balance", () => {
    ledger.transfer(ALICE, BOB, 10_000_000n);
    expect(ledger.balanceOf(ALICE)).toBe(0n);
    expect(ledger.holders()).toEqual([{ address: BOB, balance: 10_000_000n }]);
  });

  it("fails with INSUFFICIENT_BALANCE and changes nothing", () => {
    expectLedgerError(() => ledger.transfer(ALICE, BOB, 10_000_001n), "INSUFFICIENT_BALANCE");
    expect(ledger.balanceOf(ALICE)).toBe(10_000_000n);
    expect(ledger.balanceOf(BOB)).toBe(0n);
    expect(ledger.journalLength).toBe(1);
  });

  it("journals zero-value transfers", () => {
    ledger.transfer(ALICE, BOB, 0n);
    expect(ledger.journalLength).toBe(2);
    expect(ledger.balanceOf(BOB)).toBe(0n);
  });

  it("handles self transfers", () => {
    ledger.transfer(ALICE, ALICE, 4n);
    expect(ledger.balanceOf(ALICE)).toBe(10_000_000n);
  });

  it("rejects the zero address on either side", () => {
    expectLedgerError(() => ledger.transfer(ALICE, ZERO_ADDRESS, 1n), "INVALID_ADDRESS");
    expectLedgerError(() => ledger.transfer(ZERO_ADDRESS, ALICE, 1n), "INVALID_ADDRESS");
  });

  it("rejects a malformed address", () => {
    expectLedgerError(() => ledger.transfer(ALICE, "0x1234", 1n), "INVALID_ADDRESS");
  });

  it("rejects a negative value", () => {
    expectLedgerError(() => ledger.transfer(ALICE, BOB, -1n), "INVALID_AMOUNT");
  });

  it("matches addresses case-insensitively", () => {
    const upper: Address = "0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA";
    ledger.transfer(ALICE, upper, 5n);
    expect(ledger.balanceOf("0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa")).toBe(5n);
    expect(ledger.balanceOf(ALICE)).toBe(9_999_995n);
  });
});

// ─── Reversal ────────────────────────────────────────────────────────────

describe("reverseTransfer", () => {
  let ledger: TokenLedger;

  beforeEach(() => {
    ledger = newLedger();
    ledger.mint(ALICE, 100n);
  });

  it("restores balances and drops the journal entry", () => {
    const record = ledger.transfer(ALICE, BOB, 40n);
    ledger.reverseTransfer(record);
    expect(ledger.balanceOf(ALICE)).toBe(100n);
    expect(ledger.balanceOf(BOB)).toBe(0n);
    expect(ledger.journalLength).toBe(1);
  });

  it("reuses the sequence number after reversal", () => {
    ledger.reverseTransfer(ledger.transfer(ALICE, BOB, 40n));
    expect(ledger.transfer(ALICE, CAROL, 1n).sequence).toBe(2);
  });

  it("refuses to reverse anything but the latest entry", () => {
    const first = ledger.transfer(ALICE, BOB, 10n);
    ledger.transfer(ALICE, CAROL, 10n);
    expectLedgerError(() => ledger.reverseTransfer(first), "REVERSAL_OUT_OF_ORDER");
  });

  it("refuses to reverse twice", () => {
    const record = ledger.transfer(ALICE, BOB, 10n);
    ledger.reverseTransfer(record);
    expectLedgerError(() => ledger.reverseTransfer(record), "REVERSAL_OUT_OF_ORDER");
  });
});

// ─── Journal ─────────────────────────────────────────────────────────────

describe("journal", () => {
  it("filters by account, kind and sequence", () => {
    const ledger = newLedger();
    ledger.mint(ALICE, 100n);
    ledger.transfer(ALICE, BOB, 10n);
    ledger.transfer(BOB, CAROL, 5n);

    expect(ledger.journal().map((e) => e.sequence)).toEqual([1, 2, 3]);
    expect(ledger.journal({ account: BOB }).map((e) => e.sequence)).toEqual([2, 3]);
    expect(ledger.journal({ kind: "mint" }).map((e) => e.sequence)).toEqual([1]);
    expect(ledger.journal({ fromSequence: 3 }).map((e) => e.sequence)).toEqual([3]);
  });
});

// ─── Snapshot ────────────────────────────────────────────────────────────

describe("snapshot / fromSnapshot", () => {
  it("round-trips balances, supply and journal", () => {
    const ledger = newLedger();
    ledger.mint(ALICE, 10_000_000n);
    ledger.transfer(ALICE, BOB, 7_000_000n);

    const snapshot = ledger.snapshot();
    expect(snapshot.totalSupply).toBe("10000000");
    expect(snapshot.balances).toEqual({ [ALICE]: "3000000", [BOB]: "7000000" });

    const restored = TokenLedger.fromSnapshot(snapshot, { now: () => TS });
    expect(restored.balanceOf(ALICE)).toBe(3_000_000n);
    expect(restored.balanceOf(BOB)).toBe(7_000_000n);
    expect(restored.snapshot()).toEqual(snapshot);
  });

  it("survives JSON serialization", () => {
    const ledger = newLedger();
    ledger.mint(ALICE, 50n);
    const restored = TokenLedger.fromSnapshot(JSON.parse(JSON.stringify(ledger.snapshot())));
    expect(restored.totalSupply).toBe(50n);
  });

  it("rejects a snapshot whose balances disagree with the journal", () => {
    const ledger = newLedger();
    ledger.mint(ALICE, 50n);
    const snapshot = { ...ledger.snapshot(), balances: { [ALICE]: "51" } };
    expectLedgerError(() => TokenLedger.fromSnapshot(snapshot), "SNAPSHOT_MISMATCH");
  });

  it("rejects a snapshot whose supply disagrees with the journal", () => {
    const ledger = newLedger();
    ledger.mint(ALICE, 50n);
    const snapshot = { ...ledger.snapshot(), totalSupply: "49" };
    expectLedgerError(() => TokenLedger.fromSnapshot(snapshot), "SNAPSHOT_MISMATCH");
  });
});
