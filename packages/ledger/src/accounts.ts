/**
 * @presign/ledger — Balance book.
 *
 * Holds one balance per address. Addresses are keyed case-insensitively.
 *
 * Rules:
 * - Balances never go negative
 * - Zero balances are dropped, so holders() lists only funded accounts
 * - The zero address never holds a balance
 */

import { isAddress, ZERO_ADDRESS } from "@presign/types";
import type { Address } from "@presign/types";
import { checkedAdd } from "./money-math.js";
import type { HolderBalance } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Validate an address and return its lowercase key.
 */
export function normalizeAddress(address: Address): Address {
  if (!isAddress(address)) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid address: "${String(address)}"`);
  }
  return `0x${address.slice(2).toLowerCase()}`;
}

export function isZeroAddress(address: Address): boolean {
  return normalizeAddress(address) === ZERO_ADDRESS;
}

export class BalanceBook {
  private readonly _balances: Map<Address, bigint> = new Map();

  /**
   * Balance of an address. Unknown addresses hold zero.
   */
  get(address: Address): bigint {
    return this._balances.get(normalizeAddress(address)) ?? 0n;
  }

  credit(address: Address, value: bigint): void {
    const key = normalizeAddress(address);
    if (key === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_ADDRESS", "The zero address cannot hold a balance");
    }
    this._set(key, checkedAdd(this._balances.get(key) ?? 0n, value));
  }

  /**
   * Subtract from a balance. Throws if the balance is short.
   */
  debit(address: Address, value: bigint): void {
    const key = normalizeAddress(address);
    const current = this._balances.get(key) ?? 0n;
    if (current < value) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance for ${key}: has ${current.toString()}, needs ${value.toString()}`,
      );
    }
    this._set(key, current - value);
  }

  /**
   * All funded holders, ordered by address.
   */
  holders(): readonly HolderBalance[] {
    return [...this._balances.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([address, balance]) => ({ address, balance }));
  }

  get count(): number {
    return this._balances.size;
  }

  private _set(key: Address, value: bigint): void {
    if (value === 0n) {
      this._balances.delete(key);
    } else {
      this._balances.set(key, value);
    }
  }
}
