/**
 * Token Types
 *
 * Descriptive metadata for the token whose balances the ledger keeps.
 * `name` and `version` also feed the signing domain.
 */

import type { Address } from "./primitives.js";

export interface TokenMetadata {
  /** Human-readable token name (part of the signing domain) */
  readonly name: string;

  /** Signing-domain version string, e.g. "1" */
  readonly version: string;

  /** Ticker symbol */
  readonly symbol: string;

  /** Display decimals. Amounts are always stored in base units. */
  readonly decimals: number;
}

/**
 * Identifies one deployment of a token: which chain and which instance.
 * Together with the metadata this pins down the signing domain.
 */
export interface TokenDeployment {
  readonly chainId: bigint;
  readonly verifyingContract: Address;
}
