/**
 * @presign/typed-data
 *
 * Domain binding, struct hashing, digest construction and signature
 * verification for transfer, receive and cancel authorizations.
 */

export type { DomainParams, StructField, TypeHashes, TypedDataErrorCode } from "./types.js";
export { TypedDataError } from "./types.js";

export {
  EIP712_DOMAIN_TYPE,
  EIP712_DOMAIN_TYPEHASH,
  TRANSFER_WITH_AUTHORIZATION_TYPE,
  TRANSFER_WITH_AUTHORIZATION_TYPEHASH,
  RECEIVE_WITH_AUTHORIZATION_TYPE,
  RECEIVE_WITH_AUTHORIZATION_TYPEHASH,
  CANCEL_AUTHORIZATION_TYPE,
  CANCEL_AUTHORIZATION_TYPEHASH,
  TYPE_HASHES,
} from "./type-hashes.js";

export { bindDomain } from "./domain.js";

export {
  encodeField,
  hashStruct,
  hashTransferAuthorization,
  hashReceiveAuthorization,
  hashCancelAuthorization,
} from "./struct-hash.js";

export type { AuthorizationMessage } from "./digest.js";
export { typedDataDigest, authorizationDigest } from "./digest.js";

export {
  SECP256K1_N,
  SECP256K1_HALF_N,
  splitSignature,
  joinSignature,
  assertCanonical,
  recoverSigner,
  verifySigner,
} from "./signature.js";

export {
  randomNonce,
  addressOf,
  signDigest,
  signTransferAuthorization,
  signReceiveAuthorization,
  signCancelAuthorization,
} from "./signing.js";
