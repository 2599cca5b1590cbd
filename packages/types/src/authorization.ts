/**
 * Authorization Types
 *
 * A signed authorization is never stored as a record. It exists only as
 * the fields a relayer submits plus the signature over them.
 *
 * Three message shapes share the same nonce space per signer:
 * - transfer: anyone may submit
 * - receive: only the payee may submit
 * - cancel: burns a nonce without moving value
 */

import type { Address, Bytes32, SignatureParts } from "./primitives.js";

/**
 * Which operation an authorization was signed for.
 */
export type AuthorizationKind = "transfer" | "receive" | "cancel";

/**
 * Fields signed for a transfer or receive authorization.
 * Field order matches the signed struct and must not change.
 */
export interface TransferAuthorization {
  /** Payer; must be the signer */
  readonly from: Address;

  /** Payee */
  readonly to: Address;

  /** Amount in the token's smallest unit */
  readonly value: bigint;

  /** Unix seconds; valid from this instant (inclusive) */
  readonly validAfter: bigint;

  /** Unix seconds; invalid from this instant (exclusive bound) */
  readonly validBefore: bigint;

  /** Caller-chosen 32-byte nonce, unique per signer */
  readonly nonce: Bytes32;
}

/**
 * Fields signed for a cancellation.
 */
export interface CancelAuthorization {
  readonly authorizer: Address;
  readonly nonce: Bytes32;
}

/**
 * A transfer/receive authorization together with its signature.
 */
export interface SignedTransferAuthorization extends TransferAuthorization {
  readonly signature: SignatureParts;
}

/**
 * A cancellation together with its signature.
 */
export interface SignedCancelAuthorization extends CancelAuthorization {
  readonly signature: SignatureParts;
}

/**
 * How a nonce was consumed. A nonce is consumed exactly once.
 */
export type NonceConsumption = "used" | "canceled";
