/**
 * @presign/typed-data — Struct hashing.
 *
 * structHash = keccak256(typeHash || enc(field1) || enc(field2) || …)
 *
 * Every field encodes to exactly 32 bytes:
 * - address: left-padded with zeros
 * - uint256: big-endian, left-padded
 * - bytes32: as-is
 *
 * Field order is part of the protocol. Reordering fields yields a
 * different hash and therefore an invalid signature.
 */

import { concat, isAddress, isHex, keccak256, numberToHex, pad, size } from "viem";
import { MAX_UINT256 } from "@presign/types";
import type { Bytes32, CancelAuthorization, Hex, TransferAuthorization } from "@presign/types";
import {
  CANCEL_AUTHORIZATION_TYPEHASH,
  RECEIVE_WITH_AUTHORIZATION_TYPEHASH,
  TRANSFER_WITH_AUTHORIZATION_TYPEHASH,
} from "./type-hashes.js";
import { TypedDataError } from "./types.js";
import type { StructField } from "./types.js";

/**
 * Encode one field as a 32-byte word.
 *
 * @throws TypedDataError INVALID_FIELD if the value does not fit its type
 */
export function encodeField(field: StructField): Hex {
  switch (field.type) {
    case "address":
      if (!isAddress(field.value, { strict: false })) {
        throw new TypedDataError("INVALID_FIELD", `Invalid address: ${field.value}`);
      }
      return pad(field.value, { size: 32 });

    case "uint256":
      if (field.value < 0n || field.value > MAX_UINT256) {
        throw new TypedDataError(
          "INVALID_FIELD",
          `uint256 out of range: ${field.value.toString()}`,
        );
      }
      return numberToHex(field.value, { size: 32 });

    case "bytes32":
      if (!isHex(field.value, { strict: true }) || size(field.value) !== 32) {
        throw new TypedDataError("INVALID_FIELD", `Invalid bytes32: ${field.value}`);
      }
      return field.value;
  }
}

/**
 * Hash an ordered list of fields under a type hash.
 */
export function hashStruct(typeHash: Bytes32, fields: readonly StructField[]): Bytes32 {
  return keccak256(concat([typeHash, ...fields.map(encodeField)]));
}

// ─── Authorization Builders ──────────────────────────────────────────────

function transferFields(auth: TransferAuthorization): StructField[] {
  return [
    { type: "address", value: auth.from },
    { type: "address", value: auth.to },
    { type: "uint256", value: auth.value },
    { type: "uint256", value: auth.validAfter },
    { type: "uint256", value: auth.validBefore },
    { type: "bytes32", value: auth.nonce },
  ];
}

export function hashTransferAuthorization(auth: TransferAuthorization): Bytes32 {
  return hashStruct(TRANSFER_WITH_AUTHORIZATION_TYPEHASH, transferFields(auth));
}

export function hashReceiveAuthorization(auth: TransferAuthorization): Bytes32 {
  return hashStruct(RECEIVE_WITH_AUTHORIZATION_TYPEHASH, transferFields(auth));
}

export function hashCancelAuthorization(cancel: CancelAuthorization): Bytes32 {
  return hashStruct(CANCEL_AUTHORIZATION_TYPEHASH, [
    { type: "address", value: cancel.authorizer },
    { type: "bytes32", value: cancel.nonce },
  ]);
}
