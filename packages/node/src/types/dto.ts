/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Numbers travel as decimal strings; addresses are returned checksummed.
 * Signatures are accepted as { v, r, s } or as a 65-byte hex string.
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import { MAX_UINT256, isBytes32 } from "@presign/types";
import type { Address, Bytes32 } from "@presign/types";
import { splitSignature } from "@presign/typed-data";
import type { DomainParams, TypeHashes } from "@presign/typed-data";
import type { StoredEvent } from "@presign/event-store";
import type { AuthorizationReceipt } from "@presign/authorization";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "Expected a 20-byte hex address")
  .transform((v): Address => getAddress(v));

export const Uint256Schema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal integer string")
  .transform((v, ctx) => {
    const value = BigInt(v);
    if (value > MAX_UINT256) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Exceeds uint256" });
      return z.NEVER;
    }
    return value;
  });

export const Bytes32Schema = z.string().refine(isBytes32, "Expected 32 bytes of hex");

const SIGNATURE_HEX = /^0x[0-9a-fA-F]{130}$/;

export const SignatureSchema = z.union([
  z.object({
    v: z.number().int(),
    r: Bytes32Schema,
    s: Bytes32Schema,
  }),
  z
    .string()
    .regex(SIGNATURE_HEX, "Expected a 65-byte hex signature")
    .transform((v) => splitSignature(`0x${v.slice(2)}`)),
]);

// =============================================================================
// Authorization DTOs
// =============================================================================

export const TransferAuthorizationSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  value: Uint256Schema,
  validAfter: Uint256Schema,
  validBefore: Uint256Schema,
  nonce: Bytes32Schema,
  signature: SignatureSchema,
});

export type TransferAuthorizationDto = z.infer<typeof TransferAuthorizationSchema>;

export const CancelAuthorizationSchema = z.object({
  authorizer: AddressSchema,
  nonce: Bytes32Schema,
  signature: SignatureSchema,
});

export type CancelAuthorizationDto = z.infer<typeof CancelAuthorizationSchema>;

export const AuthorizationKeySchema = z.object({
  authorizer: AddressSchema,
  nonce: Bytes32Schema,
});

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export interface DomainDto {
  readonly name: string;
  readonly version: string;
  readonly chainId: string;
  readonly verifyingContract: Address;
  readonly separator: Bytes32;
}

export interface ReceiptDto {
  readonly operation: AuthorizationReceipt["operation"];
  readonly authorizer: Address;
  readonly nonce: Bytes32;
  readonly correlationId: string;
  readonly transfer?: { readonly from: Address; readonly to: Address; readonly value: string };
  readonly events: readonly StoredEvent[];
}

export interface EventPageDto {
  readonly data: readonly StoredEvent[];
  readonly pagination: {
    readonly nextPosition: number | null;
    readonly hasMore: boolean;
  };
}

export function toDomainDto(domain: DomainParams, separator: Bytes32): DomainDto {
  return {
    name: domain.name,
    version: domain.version,
    chainId: domain.chainId.toString(),
    verifyingContract: getAddress(domain.verifyingContract),
    separator,
  };
}

export function toTypeHashesDto(hashes: TypeHashes): TypeHashes {
  return { transfer: hashes.transfer, receive: hashes.receive, cancel: hashes.cancel };
}

export function toReceiptDto(receipt: AuthorizationReceipt): ReceiptDto {
  return {
    operation: receipt.operation,
    authorizer: receipt.authorizer,
    nonce: receipt.nonce,
    correlationId: receipt.correlationId,
    ...(receipt.transfer !== undefined
      ? {
          transfer: {
            from: receipt.transfer.from,
            to: receipt.transfer.to,
            value: receipt.transfer.value.toString(),
          },
        }
      : {}),
    events: receipt.events,
  };
}
