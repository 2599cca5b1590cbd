/**
 * @presign/sdk — Presign Client.
 *
 * Main entry point for the Presign SDK.
 *
 * Provides typed methods for:
 * - Authorization submission (transfer, receive, cancel) and state lookups
 * - Signing domain and type hashes
 * - Account balances
 * - The notification event log
 *
 * Design:
 * - Delegates to HttpClient for transport
 * - Namespace grouping: client.authorizations, client.domain, client.accounts, client.events
 * - Amounts go out as decimal strings and come back as bigint
 */

import type {
  Address,
  Bytes32,
  SignedCancelAuthorization,
  SignedTransferAuthorization,
} from "@presign/types";
import type { PresignClientConfig, PresignResponse } from "./types.js";
import { HttpClient } from "./http-client.js";
import {
  AuthorizationStateSchema,
  BalanceSchema,
  DomainSchema,
  EventPageSchema,
  HealthSchema,
  ReceiptSchema,
  TypeHashesSchema,
  envelope,
} from "./schemas.js";
import type {
  AuthorizationState,
  Balance,
  Domain,
  EventPage,
  Health,
  Receipt,
  TypeHashes,
} from "./schemas.js";

// =============================================================================
// Request Types
// =============================================================================

/**
 * Parameters for listing notification events.
 */
export interface ListEventsParams {
  readonly fromPosition?: number | undefined;
  readonly limit?: number | undefined;
  readonly type?: string | undefined;
}

function transferBody(auth: SignedTransferAuthorization): Record<string, unknown> {
  return {
    from: auth.from,
    to: auth.to,
    value: auth.value.toString(),
    validAfter: auth.validAfter.toString(),
    validBefore: auth.validBefore.toString(),
    nonce: auth.nonce,
    signature: { v: auth.signature.v, r: auth.signature.r, s: auth.signature.s },
  };
}

// =============================================================================
// Namespaces
// =============================================================================

/**
 * Authorization operations namespace.
 */
export class AuthorizationsNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Submit a signed transferWithAuthorization.
   */
  transfer(auth: SignedTransferAuthorization): Promise<PresignResponse<Receipt>> {
    return this.http.post("/api/v1/authorizations/transfer", transferBody(auth), envelope(ReceiptSchema));
  }

  /**
   * Submit a signed receiveWithAuthorization. The relayer only accepts
   * it from the payee, so configure the client with the payee's
   * credentials or caller address.
   */
  receive(auth: SignedTransferAuthorization): Promise<PresignResponse<Receipt>> {
    return this.http.post("/api/v1/authorizations/receive", transferBody(auth), envelope(ReceiptSchema));
  }

  /**
   * Submit a signed cancelAuthorization.
   */
  cancel(cancel: SignedCancelAuthorization): Promise<PresignResponse<Receipt>> {
    const body = {
      authorizer: cancel.authorizer,
      nonce: cancel.nonce,
      signature: { v: cancel.signature.v, r: cancel.signature.r, s: cancel.signature.s },
    };
    return this.http.post("/api/v1/authorizations/cancel", body, envelope(ReceiptSchema));
  }

  /**
   * Whether an authorizer's nonce has been consumed, and how.
   */
  state(authorizer: Address, nonce: Bytes32): Promise<PresignResponse<AuthorizationState>> {
    return this.http.get(
      `/api/v1/authorizations/${encodeURIComponent(authorizer)}/${encodeURIComponent(nonce)}`,
      envelope(AuthorizationStateSchema),
    );
  }
}

/**
 * Signing domain namespace.
 */
export class DomainNamespace {
  constructor(private readonly http: HttpClient) {}

  get(): Promise<PresignResponse<Domain>> {
    return this.http.get("/api/v1/domain", envelope(DomainSchema));
  }

  typeHashes(): Promise<PresignResponse<TypeHashes>> {
    return this.http.get("/api/v1/type-hashes", envelope(TypeHashesSchema));
  }
}

/**
 * Account queries namespace.
 */
export class AccountsNamespace {
  constructor(private readonly http: HttpClient) {}

  balance(address: Address): Promise<PresignResponse<Balance>> {
    return this.http.get(`/api/v1/accounts/${encodeURIComponent(address)}/balance`, envelope(BalanceSchema));
  }
}

/**
 * Notification event log namespace.
 */
export class EventsNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * List events in global order, starting at `fromPosition`.
   * Pass `pagination.nextPosition` back in to read the next page.
   */
  list(params?: ListEventsParams): Promise<PresignResponse<EventPage>> {
    const query = new URLSearchParams();
    if (params?.fromPosition !== undefined) query.set("fromPosition", String(params.fromPosition));
    if (params?.limit !== undefined) query.set("limit", String(params.limit));
    if (params?.type !== undefined) query.set("type", params.type);

    const qs = query.toString();
    const path = qs.length > 0 ? `/api/v1/events?${qs}` : "/api/v1/events";
    return this.http.get(path, EventPageSchema);
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Presign SDK client — main entry point.
 *
 * Usage:
 * ```typescript
 * const client = new PresignClient({
 *   baseUrl: "http://localhost:3000",
 *   apiKey: "your-api-key",
 * });
 *
 * const signed = await signTransferAuthorization(separator, authorization, privateKey);
 * const receipt = await client.authorizations.transfer(signed);
 * ```
 */
export class PresignClient {
  /** Authorization submission and state. */
  readonly authorizations: AuthorizationsNamespace;
  /** Signing domain and type hashes. */
  readonly domain: DomainNamespace;
  /** Account balances. */
  readonly accounts: AccountsNamespace;
  /** Notification event log. */
  readonly events: EventsNamespace;

  private readonly http: HttpClient;

  constructor(config: PresignClientConfig) {
    this.http = new HttpClient(config);
    this.authorizations = new AuthorizationsNamespace(this.http);
    this.domain = new DomainNamespace(this.http);
    this.accounts = new AccountsNamespace(this.http);
    this.events = new EventsNamespace(this.http);
  }

  /**
   * Liveness probe.
   */
  health(): Promise<PresignResponse<Health>> {
    return this.http.get("/health", HealthSchema);
  }
}
