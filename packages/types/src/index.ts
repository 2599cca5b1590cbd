/**
 * @presign/types — Shared domain types for the Presign stack.
 *
 * These types are used across all Presign packages:
 * - Byte-level primitives (addresses, 32-byte values, signatures)
 * - Authorization message shapes
 * - Token metadata
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Primitives
export type { Hex, Address, Bytes32, SignatureParts } from "./primitives.js";
export { MAX_UINT256, ZERO_ADDRESS } from "./primitives.js";

// Authorization types
export type {
  AuthorizationKind,
  TransferAuthorization,
  CancelAuthorization,
  SignedTransferAuthorization,
  SignedCancelAuthorization,
  NonceConsumption,
} from "./authorization.js";

// Token types
export type { TokenMetadata, TokenDeployment } from "./token.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isHex,
  isAddress,
  isBytes32,
  isSignatureParts,
  isAuthorizationKind,
  isNonceConsumption,
  isTokenMetadata,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
