/**
 * @presign/typed-data — Types for structured-message hashing and signatures.
 *
 * Rules:
 * - Every hashing function is pure: same inputs → same 32 bytes
 * - Field encodings are fixed-width (32 bytes each)
 * - Fail-closed: malformed input throws, never hashes silently
 */

import type { Address, Bytes32 } from "@presign/types";

// ─── Domain ──────────────────────────────────────────────────────────────

/**
 * Inputs that bind signatures to one token instance on one chain.
 */
export interface DomainParams {
  readonly name: string;
  readonly version: string;
  readonly chainId: bigint;
  readonly verifyingContract: Address;
}

// ─── Struct Fields ───────────────────────────────────────────────────────

/**
 * A single typed value in a signed struct.
 * Only the three ABI types the authorization messages use are supported.
 */
export type StructField =
  | { readonly type: "address"; readonly value: Address }
  | { readonly type: "uint256"; readonly value: bigint }
  | { readonly type: "bytes32"; readonly value: Bytes32 };

/**
 * The three authorization type hashes, keyed by operation.
 */
export interface TypeHashes {
  readonly transfer: Bytes32;
  readonly receive: Bytes32;
  readonly cancel: Bytes32;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for hashing and signature operations. */
export type TypedDataErrorCode =
  | "INVALID_DOMAIN"
  | "INVALID_FIELD"
  | "INVALID_SIGNATURE";

/**
 * Structured error from the typed-data layer.
 */
export class TypedDataError extends Error {
  public readonly code: TypedDataErrorCode;

  constructor(code: TypedDataErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TypedDataError";
    this.code = code;
  }
}
