/**
 * Shared fixtures for typed-data tests.
 */

import type { Address, Bytes32, Hex, TransferAuthorization } from "@presign/types";
import type { DomainParams } from "../src/types.js";

export const ALICE_KEY: Hex = `0x${"11".repeat(32)}`;
export const BOB_KEY: Hex = `0x${"22".repeat(32)}`;

export const TOKEN_CONTRACT: Address = "0x5fbdb2315678afecb367f032d93f642f64180aa3";
export const PAYEE: Address = "0x70997970c51812dc3a010c7d01b50e0d17dc79c8";

export const NONCE_A: Bytes32 = `0x${"ab".repeat(32)}`;
export const NONCE_B: Bytes32 = `0x${"cd".repeat(32)}`;

export const DOMAIN: DomainParams = {
  name: "Presign Dollar",
  version: "1",
  chainId: 1n,
  verifyingContract: TOKEN_CONTRACT,
};

export function transferAuth(from: Address, overrides?: Partial<TransferAuthorization>): TransferAuthorization {
  return {
    from,
    to: PAYEE,
    value: 7_000_000n,
    validAfter: 0n,
    validBefore: 2_000_000_000n,
    nonce: NONCE_A,
    ...overrides,
  };
}
