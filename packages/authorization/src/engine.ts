/**
 * @presign/authorization — Authorization engine.
 *
 * Executes signed transfer, receive and cancel authorizations against the
 * ledger and records what happened in the notification log.
 *
 * Per (authorizer, nonce) the state machine is Unused → Used, terminal.
 *
 * Check order for transfer/receive:
 * 1. (receive only) caller must be the payee
 * 2. nonce unused
 * 3. now >= validAfter
 * 4. now < validBefore
 * 5. signature recovers to `from` over the operation's own type hash
 * 6. commit: consume nonce → ledger transfer → append notifications
 *
 * Each operation holds the authorizer's lock from step 2 through commit.
 * Signature recovery is the only await inside the lock; the commit itself
 * is synchronous.
 */

import { randomUUID } from "node:crypto";
import { getAddress, isAddress } from "viem";
import { MAX_UINT256, isBytes32 } from "@presign/types";
import type {
  Address,
  Bytes32,
  DomainEvent,
  NonceConsumption,
  SignatureParts,
  SignedCancelAuthorization,
  SignedTransferAuthorization,
} from "@presign/types";
import {
  TYPE_HASHES,
  TypedDataError,
  authorizationDigest,
  bindDomain,
  verifySigner,
} from "@presign/typed-data";
import type { AuthorizationMessage, DomainParams, TypeHashes } from "@presign/typed-data";
import { PRESIGN_EVENTS } from "@presign/event-store";
import type { EventStore, StoredEvent } from "@presign/event-store";
import type { TransferRecord } from "@presign/ledger";
import { systemClock, toIsoTimestamp } from "./clock.js";
import { KeyedLock } from "./keyed-lock.js";
import { NonceRegistry } from "./nonce-registry.js";
import { UnitOfWork } from "./unit-of-work.js";
import type {
  AuthorizationOperation,
  AuthorizationReceipt,
  Clock,
  LedgerPort,
  NonceClaim,
  NonceEntry,
  NonceRegistryView,
  SubmissionContext,
} from "./types.js";
import { AuthorizationError } from "./types.js";

export interface AuthorizationEngineOptions {
  readonly domain: DomainParams;
  readonly ledger: LedgerPort;
  readonly eventStore: EventStore;
  readonly clock?: Clock | undefined;
  /** Existing registry, e.g. rebuilt with NonceRegistry.fromEvents() */
  readonly registry?: NonceRegistry | undefined;
  readonly generateId?: (() => string) | undefined;
}

/** Stream holding one authorizer's notifications */
export function authorizerStream(authorizer: Address): string {
  return `authorizer-${getAddress(authorizer)}`;
}

export class AuthorizationEngine {
  private readonly _domain: DomainParams;
  private readonly _domainSeparator: Bytes32;
  private readonly _ledger: LedgerPort;
  private readonly _events: EventStore;
  private readonly _clock: Clock;
  private readonly _registry: NonceRegistry;
  private readonly _registryView: NonceRegistryView;
  private readonly _generateId: () => string;
  private readonly _locks = new KeyedLock();

  constructor(options: AuthorizationEngineOptions) {
    this._domain = { ...options.domain };
    this._domainSeparator = bindDomain(options.domain);
    this._ledger = options.ledger;
    this._events = options.eventStore;
    this._clock = options.clock ?? systemClock;
    this._registry = options.registry ?? new NonceRegistry();
    this._registryView = this._registry.view();
    this._generateId = options.generateId ?? randomUUID;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get domain(): DomainParams {
    return this._domain;
  }

  get domainSeparator(): Bytes32 {
    return this._domainSeparator;
  }

  get typeHashes(): TypeHashes {
    return TYPE_HASHES;
  }

  authorizationState(authorizer: Address, nonce: Bytes32): boolean {
    return this._registry.isUsed(authorizer, nonce);
  }

  /**
   * How and when a nonce was consumed, if it was.
   */
  authorizationEntry(authorizer: Address, nonce: Bytes32): NonceEntry | undefined {
    return this._registry.get(authorizer, nonce);
  }

  /**
   * Read-only view of consumed nonces.
   */
  get registry(): NonceRegistryView {
    return this._registryView;
  }

  // ─── Operations ──────────────────────────────────────────────────────

  /**
   * Execute a transfer authorization. Anyone may submit.
   */
  async transferWithAuthorization(
    auth: SignedTransferAuthorization,
    context?: SubmissionContext,
  ): Promise<AuthorizationReceipt> {
    assertTransferFields(auth);
    return this._executeTransfer("transfer", auth, context?.actor ?? "relayer");
  }

  /**
   * Execute a receive authorization. Only the payee may submit.
   */
  async receiveWithAuthorization(
    auth: SignedTransferAuthorization,
    caller: Address,
  ): Promise<AuthorizationReceipt> {
    assertTransferFields(auth);
    assertAddress(caller, "caller");
    if (getAddress(caller) !== getAddress(auth.to)) {
      throw new AuthorizationError(
        "CALLER_NOT_PAYEE",
        `Caller ${getAddress(caller)} is not the payee ${getAddress(auth.to)}`,
      );
    }
    return this._executeTransfer("receive", auth, getAddress(caller));
  }

  /**
   * Burn a nonce without moving value. Anyone may submit.
   */
  async cancelAuthorization(
    cancel: SignedCancelAuthorization,
    context?: SubmissionContext,
  ): Promise<AuthorizationReceipt> {
    assertAddress(cancel.authorizer, "authorizer");
    assertNonce(cancel.nonce);

    const authorizer = getAddress(cancel.authorizer);
    const actor = context?.actor ?? "relayer";

    return this._locks.run(lockKey(authorizer), async () => {
      this._registry.assertUnused(authorizer, cancel.nonce);

      await this._verify(
        { kind: "cancel", message: { authorizer, nonce: cancel.nonce } },
        cancel.signature,
        authorizer,
      );

      const now = this._clock.now();
      const correlationId = this._generateId();
      const canceled = this._event(PRESIGN_EVENTS.AUTHORIZATION_CANCELED, actor, correlationId, now, {
        authorizer,
        nonce: cancel.nonce.toLowerCase(),
      });

      const stored = this._commit(authorizer, cancel.nonce, "canceled", now, () => [canceled]);

      return {
        operation: "cancel",
        authorizer,
        nonce: cancel.nonce,
        correlationId,
        events: stored,
      };
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private async _executeTransfer(
    operation: Exclude<AuthorizationOperation, "cancel">,
    auth: SignedTransferAuthorization,
    actor: string,
  ): Promise<AuthorizationReceipt> {
    const from = getAddress(auth.from);
    const to = getAddress(auth.to);

    return this._locks.run(lockKey(from), async () => {
      this._registry.assertUnused(from, auth.nonce);

      const now = this._clock.now();
      if (now < auth.validAfter) {
        throw new AuthorizationError(
          "AUTHORIZATION_NOT_YET_VALID",
          `Authorization is valid after ${auth.validAfter.toString()}, now ${now.toString()}`,
        );
      }
      if (now >= auth.validBefore) {
        throw new AuthorizationError(
          "AUTHORIZATION_EXPIRED",
          `Authorization expired at ${auth.validBefore.toString()}, now ${now.toString()}`,
        );
      }

      const message = {
        from,
        to,
        value: auth.value,
        validAfter: auth.validAfter,
        validBefore: auth.validBefore,
        nonce: auth.nonce,
      };
      await this._verify({ kind: operation, message }, auth.signature, from);

      const correlationId = this._generateId();
      let record: TransferRecord | undefined;

      const stored = this._commit(from, auth.nonce, "used", now, () => {
        const used = this._event(PRESIGN_EVENTS.AUTHORIZATION_USED, actor, correlationId, now, {
          authorizer: from,
          nonce: auth.nonce.toLowerCase(),
          kind: operation,
        });
        const transfer = this._event(
          PRESIGN_EVENTS.LEDGER_TRANSFER,
          actor,
          correlationId,
          now,
          { from, to, value: auth.value.toString() },
          used.metadata.eventId,
        );
        return [used, transfer];
      }, {
        label: "ledger",
        apply: () => {
          record = this._ledger.transfer(from, to, auth.value);
        },
        undo: () => {
          if (record !== undefined) {
            this._ledger.reverseTransfer(record);
          }
        },
      });

      return {
        operation,
        authorizer: from,
        nonce: auth.nonce,
        correlationId,
        transfer: { from, to, value: auth.value },
        events: stored,
      };
    });
  }

  /**
   * Consume the nonce, run the optional ledger step and append the
   * notifications as one unit of work.
   */
  private _commit(
    authorizer: Address,
    nonce: Bytes32,
    consumption: NonceConsumption,
    now: bigint,
    buildEvents: () => readonly DomainEvent[],
    ledgerStep?: { label: string; apply(): void; undo(): void },
  ): readonly StoredEvent[] {
    const stream = authorizerStream(authorizer);
    const expectedVersion = this._events.streamVersion(stream);
    const events = buildEvents();
    let stored: readonly StoredEvent[] = [];

    let claim: NonceClaim | undefined;

    const unit = new UnitOfWork().add({
      label: "nonce",
      prepare: () => this._registry.assertUnused(authorizer, nonce),
      apply: () => {
        claim = this._registry.markUsed(authorizer, nonce, consumption, toIsoTimestamp(now));
      },
      undo: () => claim?.release(),
    });

    if (ledgerStep !== undefined) {
      unit.add(ledgerStep);
    }

    unit.add({
      label: "notifications",
      apply: () => {
        stored = this._events.append(stream, events, { expectedVersion }).events;
      },
    });

    unit.commit();
    return stored;
  }

  private async _verify(
    message: AuthorizationMessage,
    signature: SignatureParts,
    expected: Address,
  ): Promise<void> {
    const digest = authorizationDigest(this._domainSeparator, message);
    try {
      await verifySigner(digest, signature, expected);
    } catch (err) {
      if (err instanceof TypedDataError) {
        throw new AuthorizationError("INVALID_SIGNATURE", err.message, { cause: err });
      }
      throw err;
    }
  }

  private _event(
    type: string,
    actor: string,
    correlationId: string,
    now: bigint,
    payload: Record<string, unknown>,
    causationId?: string,
  ): DomainEvent {
    return {
      type,
      metadata: {
        eventId: this._generateId(),
        timestamp: toIsoTimestamp(now),
        actor,
        correlationId,
        source: type.startsWith("ledger.") ? "ledger" : "authorization",
        ...(causationId !== undefined ? { causationId } : {}),
      },
      payload,
    };
  }
}

// ─── Input Validation ────────────────────────────────────────────────────

function lockKey(authorizer: Address): string {
  return authorizer.toLowerCase();
}

function assertAddress(value: Address, field: string): void {
  if (!isAddress(value, { strict: false })) {
    throw new AuthorizationError("INVALID_AUTHORIZATION", `Invalid ${field} address: ${String(value)}`);
  }
}

function assertUint256(value: bigint, field: string): void {
  if (typeof value !== "bigint" || value < 0n || value > MAX_UINT256) {
    throw new AuthorizationError("INVALID_AUTHORIZATION", `${field} must be a uint256`);
  }
}

function assertNonce(nonce: Bytes32): void {
  if (!isBytes32(nonce)) {
    throw new AuthorizationError("INVALID_AUTHORIZATION", `Nonce must be 32 bytes: ${String(nonce)}`);
  }
}

function assertTransferFields(auth: SignedTransferAuthorization): void {
  assertAddress(auth.from, "from");
  assertAddress(auth.to, "to");
  assertUint256(auth.value, "value");
  assertUint256(auth.validAfter, "validAfter");
  assertUint256(auth.validBefore, "validBefore");
  assertNonce(auth.nonce);
}
