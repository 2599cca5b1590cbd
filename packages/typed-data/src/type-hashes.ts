/**
 * @presign/typed-data — Type signatures and their hashes.
 *
 * Each message shape is identified by keccak256 of its canonical type
 * string. Because the type hash is the first word of every struct hash,
 * a signature for one shape can never verify as another.
 */

import { keccak256, stringToHex } from "viem";
import type { Bytes32 } from "@presign/types";
import type { TypeHashes } from "./types.js";

export const EIP712_DOMAIN_TYPE =
  "EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)";

export const TRANSFER_WITH_AUTHORIZATION_TYPE =
  "TransferWithAuthorization(address from,address to,uint256 value,uint256 validAfter,uint256 validBefore,bytes32 nonce)";

export const RECEIVE_WITH_AUTHORIZATION_TYPE =
  "ReceiveWithAuthorization(address from,address to,uint256 value,uint256 validAfter,uint256 validBefore,bytes32 nonce)";

export const CANCEL_AUTHORIZATION_TYPE =
  "CancelAuthorization(address authorizer,bytes32 nonce)";

function typeHash(signature: string): Bytes32 {
  return keccak256(stringToHex(signature));
}

export const EIP712_DOMAIN_TYPEHASH: Bytes32 = typeHash(EIP712_DOMAIN_TYPE);
export const TRANSFER_WITH_AUTHORIZATION_TYPEHASH: Bytes32 = typeHash(TRANSFER_WITH_AUTHORIZATION_TYPE);
export const RECEIVE_WITH_AUTHORIZATION_TYPEHASH: Bytes32 = typeHash(RECEIVE_WITH_AUTHORIZATION_TYPE);
export const CANCEL_AUTHORIZATION_TYPEHASH: Bytes32 = typeHash(CANCEL_AUTHORIZATION_TYPE);

export const TYPE_HASHES: TypeHashes = Object.freeze({
  transfer: TRANSFER_WITH_AUTHORIZATION_TYPEHASH,
  receive: RECEIVE_WITH_AUTHORIZATION_TYPEHASH,
  cancel: CANCEL_AUTHORIZATION_TYPEHASH,
});
