/**
 * @presign/typed-data — Signing digest.
 *
 * digest = keccak256(0x19 || 0x01 || domainSeparator || structHash)
 */

import { concat, keccak256 } from "viem";
import type { Bytes32, CancelAuthorization, TransferAuthorization } from "@presign/types";
import {
  hashCancelAuthorization,
  hashReceiveAuthorization,
  hashTransferAuthorization,
} from "./struct-hash.js";

const EIP191_TYPED_DATA_PREFIX = "0x1901";

export function typedDataDigest(domainSeparator: Bytes32, structHash: Bytes32): Bytes32 {
  return keccak256(concat([EIP191_TYPED_DATA_PREFIX, domainSeparator, structHash]));
}

/**
 * The digest a signer must sign for a given authorization.
 */
export type AuthorizationMessage =
  | { readonly kind: "transfer"; readonly message: TransferAuthorization }
  | { readonly kind: "receive"; readonly message: TransferAuthorization }
  | { readonly kind: "cancel"; readonly message: CancelAuthorization };

export function authorizationDigest(
  domainSeparator: Bytes32,
  authorization: AuthorizationMessage,
): Bytes32 {
  return typedDataDigest(domainSeparator, structHashOf(authorization));
}

function structHashOf(authorization: AuthorizationMessage): Bytes32 {
  switch (authorization.kind) {
    case "transfer":
      return hashTransferAuthorization(authorization.message);
    case "receive":
      return hashReceiveAuthorization(authorization.message);
    case "cancel":
      return hashCancelAuthorization(authorization.message);
  }
}
