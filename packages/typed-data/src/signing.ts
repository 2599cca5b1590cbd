/**
 * @presign/typed-data — Client-side signing helpers.
 *
 * Used by the SDK, the demo and tests to produce authorizations the way a
 * wallet would. The relayer itself never holds a private key.
 */

import { randomBytes } from "node:crypto";
import { bytesToHex, pad } from "viem";
import { privateKeyToAccount, sign } from "viem/accounts";
import type {
  Address,
  Bytes32,
  CancelAuthorization,
  Hex,
  SignatureParts,
  SignedCancelAuthorization,
  SignedTransferAuthorization,
  TransferAuthorization,
} from "@presign/types";
import { authorizationDigest } from "./digest.js";

/**
 * A fresh random 32-byte nonce.
 */
export function randomNonce(): Bytes32 {
  return bytesToHex(randomBytes(32));
}

/**
 * The checksummed address controlled by a private key.
 */
export function addressOf(privateKey: Hex): Address {
  return privateKeyToAccount(privateKey).address;
}

/**
 * Sign a raw 32-byte digest. Returns v as 27/28.
 */
export async function signDigest(digest: Bytes32, privateKey: Hex): Promise<SignatureParts> {
  const signature = await sign({ hash: digest, privateKey });
  const yParity = signature.yParity ?? (signature.v === 28n ? 1 : 0);
  return {
    v: 27 + yParity,
    r: pad(signature.r, { size: 32 }),
    s: pad(signature.s, { size: 32 }),
  };
}

export async function signTransferAuthorization(
  domainSeparator: Bytes32,
  auth: TransferAuthorization,
  privateKey: Hex,
): Promise<SignedTransferAuthorization> {
  const digest = authorizationDigest(domainSeparator, { kind: "transfer", message: auth });
  return { ...auth, signature: await signDigest(digest, privateKey) };
}

export async function signReceiveAuthorization(
  domainSeparator: Bytes32,
  auth: TransferAuthorization,
  privateKey: Hex,
): Promise<SignedTransferAuthorization> {
  const digest = authorizationDigest(domainSeparator, { kind: "receive", message: auth });
  return { ...auth, signature: await signDigest(digest, privateKey) };
}

export async function signCancelAuthorization(
  domainSeparator: Bytes32,
  cancel: CancelAuthorization,
  privateKey: Hex,
): Promise<SignedCancelAuthorization> {
  const digest = authorizationDigest(domainSeparator, { kind: "cancel", message: cancel });
  return { ...cancel, signature: await signDigest(digest, privateKey) };
}
