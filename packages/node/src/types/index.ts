/**
 * Type barrel — re-exports all public types from @presign/node.
 */

// DTOs
export {
  AddressSchema,
  Uint256Schema,
  Bytes32Schema,
  SignatureSchema,
  TransferAuthorizationSchema,
  CancelAuthorizationSchema,
  AuthorizationKeySchema,
  ListEventsQuerySchema,
  toDomainDto,
  toTypeHashesDto,
  toReceiptDto,
} from "./dto.js";
export type {
  TransferAuthorizationDto,
  CancelAuthorizationDto,
  ListEventsQuery,
  DomainDto,
  ReceiptDto,
  EventPageDto,
} from "./dto.js";

// Error
export { ERROR_STATUS, createErrorEnvelope, isApiErrorCode } from "./error.js";
export type { ApiErrorCode, DomainErrorCode, HttpErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
