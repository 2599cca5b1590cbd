/**
 * @presign/sdk — Response schemas.
 *
 * Mirrors the relayer's JSON responses. Decimal-string amounts are
 * turned back into bigint; everything else stays as sent.
 */

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import { isAddress, isBytes32 } from "@presign/types";
import type { Address, Bytes32 } from "@presign/types";

const AddressSchema = z.custom<Address>(isAddress, "Expected an address");
const Bytes32Schema = z.custom<Bytes32>(isBytes32, "Expected 32 bytes of hex");
const AmountSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((v) => BigInt(v));

/** Wrap a payload schema in the `{ data }` envelope and unwrap it on parse. */
export function envelope<T>(schema: ZodType<T, ZodTypeDef, unknown>): ZodType<T, ZodTypeDef, unknown> {
  return z.object({ data: z.unknown() }).transform((body, ctx) => {
    const parsed = schema.safeParse(body.data);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: ["data", ...issue.path] });
      }
      return z.NEVER;
    }
    return parsed.data;
  });
}

// ─── Events ──────────────────────────────────────────────────────────

export const StoredEventSchema = z.object({
  event: z.object({
    type: z.string(),
    metadata: z.object({
      eventId: z.string(),
      timestamp: z.string(),
      actor: z.string(),
      correlationId: z.string(),
      causationId: z.string().optional(),
      source: z.enum(["authorization", "ledger"]),
    }),
    payload: z.record(z.unknown()),
  }),
  streamId: z.string(),
  version: z.number().int(),
  globalPosition: z.number().int(),
  appendedAt: z.string(),
  hash: z.string(),
  previousHash: z.string(),
});

export type NotificationEvent = z.infer<typeof StoredEventSchema>;

export const EventPageSchema = z.object({
  data: z.array(StoredEventSchema),
  pagination: z.object({
    nextPosition: z.number().int().nullable(),
    hasMore: z.boolean(),
  }),
});

export type EventPage = z.infer<typeof EventPageSchema>;

// ─── Authorizations ──────────────────────────────────────────────────

export const ReceiptSchema = z.object({
  operation: z.enum(["transfer", "receive", "cancel"]),
  authorizer: AddressSchema,
  nonce: Bytes32Schema,
  correlationId: z.string(),
  transfer: z
    .object({
      from: AddressSchema,
      to: AddressSchema,
      value: AmountSchema,
    })
    .optional(),
  events: z.array(StoredEventSchema),
});

export type Receipt = z.infer<typeof ReceiptSchema>;

export const AuthorizationStateSchema = z.object({
  authorizer: AddressSchema,
  nonce: Bytes32Schema,
  used: z.boolean(),
  consumption: z.enum(["used", "canceled"]).nullable(),
  consumedAt: z.string().nullable(),
});

export type AuthorizationState = z.infer<typeof AuthorizationStateSchema>;

// ─── Domain ──────────────────────────────────────────────────────────

export const DomainSchema = z.object({
  name: z.string(),
  version: z.string(),
  chainId: AmountSchema,
  verifyingContract: AddressSchema,
  separator: Bytes32Schema,
});

export type Domain = z.infer<typeof DomainSchema>;

export const TypeHashesSchema = z.object({
  transfer: Bytes32Schema,
  receive: Bytes32Schema,
  cancel: Bytes32Schema,
});

export type TypeHashes = z.infer<typeof TypeHashesSchema>;

// ─── Accounts ────────────────────────────────────────────────────────

export const BalanceSchema = z.object({
  address: AddressSchema,
  balance: AmountSchema,
  decimals: z.number().int(),
  symbol: z.string(),
});

export type Balance = z.infer<typeof BalanceSchema>;

// ─── Health ──────────────────────────────────────────────────────────

export const HealthSchema = z.object({
  status: z.string(),
  timestamp: z.string(),
});

export type Health = z.infer<typeof HealthSchema>;
