/**
 * Primitive Types
 *
 * Byte-level values shared by the signing, ledger and relayer layers.
 *
 * Rules:
 * - Hex strings are always 0x-prefixed
 * - Addresses are 20 bytes, nonces and hashes are 32 bytes
 * - Integers that travel on the wire are uint256 and carried as bigint
 */

/**
 * A 0x-prefixed hex string.
 * Structurally identical to viem's `Hex` so values flow between them freely.
 */
export type Hex = `0x${string}`;

/**
 * A 20-byte account identifier (EIP-55 checksummed at the boundaries).
 */
export type Address = `0x${string}`;

/**
 * A 32-byte value: nonces, struct hashes, digests, domain separators.
 */
export type Bytes32 = `0x${string}`;

/**
 * An ECDSA signature split into its recovery id and scalars.
 *
 * `v` is 27 or 28; `r` and `s` are 32-byte big-endian scalars.
 */
export interface SignatureParts {
  readonly v: number;
  readonly r: Bytes32;
  readonly s: Bytes32;
}

/** 2^256 - 1, the largest value a uint256 field can carry. */
export const MAX_UINT256: bigint = (1n << 256n) - 1n;

/** The all-zero address. Never a valid transfer party. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
