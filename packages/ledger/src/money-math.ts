/**
 * @presign/ledger — Deterministic token arithmetic.
 *
 * All arithmetic uses bigint base units. Display strings are converted
 * to/from base units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are unsigned and fit in uint256
 * - Zero runtime dependencies beyond @presign/types
 */

import { MAX_UINT256 } from "@presign/types";
import { LedgerError } from "./types.js";

/**
 * Assert a base-unit amount is a valid uint256.
 */
export function assertAmount(value: bigint): void {
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must not be negative: ${value.toString()}`);
  }
  if (value > MAX_UINT256) {
    throw new LedgerError("INVALID_AMOUNT", `Amount exceeds uint256: ${value.toString()}`);
  }
}

/**
 * Add two amounts, failing instead of exceeding uint256.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > MAX_UINT256) {
    throw new LedgerError(
      "SUPPLY_OVERFLOW",
      `Addition overflows uint256: ${a.toString()} + ${b.toString()}`,
    );
  }
  return sum;
}

/**
 * Parse a base-unit integer string ("7000000") into a bigint.
 */
export function parseBaseUnits(raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid base-unit amount: "${raw}"`);
  }
  const value = BigInt(raw);
  assertAmount(value);
  return value;
}

/**
 * Parse a display amount into base units.
 *
 * "7" with decimals=6 → 7000000n
 * "0.5" with decimals=6 → 500000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  assertAmount(value);
  return value;
}

/**
 * Render base units as a display amount.
 *
 * 7000000n with decimals=6 → "7.000000"
 * 7n with decimals=0 → "7"
 */
export function formatAmount(value: bigint, decimals: number): string {
  assertAmount(value);
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}
