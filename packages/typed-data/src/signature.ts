/**
 * @presign/typed-data — Signature verification.
 *
 * Rules:
 * - v must be 27 or 28
 * - r and s must be in [1, n)
 * - s must be in the lower half of the curve order (EIP-2)
 * - Any failure is INVALID_SIGNATURE; recovery never returns a fallback
 */

import { concat, hexToBigInt, isAddress, isAddressEqual, isHex, numberToHex, recoverAddress, size, slice } from "viem";
import type { Address, Bytes32, Hex, SignatureParts } from "@presign/types";
import { TypedDataError } from "./types.js";

/** secp256k1 group order. */
export const SECP256K1_N =
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

/** Largest canonical s value. */
export const SECP256K1_HALF_N = SECP256K1_N >> 1n;

// ─── Encoding ────────────────────────────────────────────────────────────

/**
 * Split a 65-byte r||s||v signature. A trailing v of 0/1 is lifted to 27/28.
 */
export function splitSignature(signature: Hex): SignatureParts {
  if (!isHex(signature, { strict: true }) || size(signature) !== 65) {
    throw new TypedDataError("INVALID_SIGNATURE", "Signature must be 65 bytes");
  }
  const rawV = Number(hexToBigInt(slice(signature, 64, 65)));
  return {
    r: slice(signature, 0, 32),
    s: slice(signature, 32, 64),
    v: rawV < 27 ? rawV + 27 : rawV,
  };
}

/**
 * Join signature parts into the 65-byte r||s||v form.
 */
export function joinSignature(parts: SignatureParts): Hex {
  assertCanonical(parts);
  return concat([parts.r, parts.s, numberToHex(parts.v, { size: 1 })]);
}

// ─── Validation ──────────────────────────────────────────────────────────

function scalar(value: Bytes32, name: string): bigint {
  if (!isHex(value, { strict: true }) || size(value) !== 32) {
    throw new TypedDataError("INVALID_SIGNATURE", `Signature ${name} must be 32 bytes`);
  }
  return hexToBigInt(value);
}

/**
 * Reject malformed or malleable signatures.
 */
export function assertCanonical(parts: SignatureParts): void {
  if (parts.v !== 27 && parts.v !== 28) {
    throw new TypedDataError("INVALID_SIGNATURE", `Invalid recovery id v=${parts.v}`);
  }
  const r = scalar(parts.r, "r");
  const s = scalar(parts.s, "s");
  if (r === 0n || r >= SECP256K1_N) {
    throw new TypedDataError("INVALID_SIGNATURE", "Signature r out of range");
  }
  if (s === 0n || s >= SECP256K1_N) {
    throw new TypedDataError("INVALID_SIGNATURE", "Signature s out of range");
  }
  if (s > SECP256K1_HALF_N) {
    throw new TypedDataError("INVALID_SIGNATURE", "Signature s is not canonical");
  }
}

// ─── Recovery ────────────────────────────────────────────────────────────

/**
 * Recover the address that produced `signature` over `digest`.
 *
 * @throws TypedDataError INVALID_SIGNATURE
 */
export async function recoverSigner(digest: Bytes32, signature: SignatureParts): Promise<Address> {
  assertCanonical(signature);
  try {
    return await recoverAddress({ hash: digest, signature: joinSignature(signature) });
  } catch (err) {
    throw new TypedDataError("INVALID_SIGNATURE", "Signature recovery failed", { cause: err });
  }
}

/**
 * Recover the signer and require it to equal `expected`.
 *
 * @returns the recovered (checksummed) address
 * @throws TypedDataError INVALID_SIGNATURE on mismatch
 */
export async function verifySigner(
  digest: Bytes32,
  signature: SignatureParts,
  expected: Address,
): Promise<Address> {
  const recovered = await recoverSigner(digest, signature);
  if (!isAddress(expected, { strict: false }) || !isAddressEqual(recovered, expected)) {
    throw new TypedDataError(
      "INVALID_SIGNATURE",
      `Signature was produced by ${recovered}, not ${expected}`,
    );
  }
  return recovered;
}
