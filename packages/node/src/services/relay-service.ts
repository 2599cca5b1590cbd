/**
 * RelayService — Composition root for the relayer.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One instance owns one token: its ledger, its
 * notification log and its authorization engine.
 */

import { randomUUID } from "node:crypto";
import { getAddress } from "viem";
import type {
  Address,
  Bytes32,
  SignedCancelAuthorization,
  SignedTransferAuthorization,
  TokenMetadata,
} from "@presign/types";
import { TokenLedger } from "@presign/ledger";
import { InMemoryEventStore, PRESIGN_EVENTS, createPresignCatalog } from "@presign/event-store";
import type { EventStoreIntegrityResult, ReadAllOptions, StoredEvent } from "@presign/event-store";
import { AuthorizationEngine, systemClock, toIsoTimestamp } from "@presign/authorization";
import type {
  AuthorizationOperation,
  AuthorizationReceipt,
  Clock,
  NonceEntry,
} from "@presign/authorization";
import type { DomainParams, TypeHashes } from "@presign/typed-data";

// =============================================================================
// Configuration
// =============================================================================

export interface GenesisMint {
  readonly holder: Address;
  readonly supply: bigint;
}

/**
 * Result of one submitted operation, reported to `onOutcome`.
 * `outcome` is "ok" or the error code of the rejection.
 */
export interface AuthorizationOutcome {
  readonly operation: AuthorizationOperation;
  readonly authorizer: Address;
  readonly nonce: Bytes32;
  readonly outcome: string;
  readonly durationMs: number;
}

export interface RelayServiceConfig {
  readonly token: TokenMetadata;
  readonly chainId: bigint;
  readonly verifyingContract: Address;
  readonly genesis?: GenesisMint | undefined;
  readonly clock?: Clock | undefined;
  readonly generateId?: (() => string) | undefined;
  readonly onOutcome?: ((outcome: AuthorizationOutcome) => void) | undefined;
}

/** Stream holding ledger events that no authorizer caused */
export const LEDGER_STREAM = "ledger";

export interface HealthReport {
  readonly ready: boolean;
  readonly integrity: EventStoreIntegrityResult;
  readonly supplyConsistent: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class RelayService {
  readonly ledger: TokenLedger;
  readonly eventStore: InMemoryEventStore;
  readonly engine: AuthorizationEngine;

  private readonly _onOutcome: ((outcome: AuthorizationOutcome) => void) | undefined;
  private _ready = false;

  constructor(config: RelayServiceConfig) {
    const clock = config.clock ?? systemClock;
    const generateId = config.generateId ?? randomUUID;
    const now = (): string => toIsoTimestamp(clock.now());

    this.ledger = new TokenLedger({ metadata: config.token, now });
    this.eventStore = new InMemoryEventStore({ catalog: createPresignCatalog(), now });
    this.engine = new AuthorizationEngine({
      domain: {
        name: config.token.name,
        version: config.token.version,
        chainId: config.chainId,
        verifyingContract: config.verifyingContract,
      },
      ledger: this.ledger,
      eventStore: this.eventStore,
      clock,
      generateId,
    });
    this._onOutcome = config.onOutcome;

    if (config.genesis !== undefined && config.genesis.supply > 0n) {
      this._mintGenesis(config.genesis, generateId, now());
    }

    this._ready = true;
  }

  // ─── Signing Domain ────────────────────────────────────────────────

  get domain(): DomainParams {
    return this.engine.domain;
  }

  get domainSeparator(): Bytes32 {
    return this.engine.domainSeparator;
  }

  get typeHashes(): TypeHashes {
    return this.engine.typeHashes;
  }

  // ─── Authorizations ────────────────────────────────────────────────

  authorizationState(authorizer: Address, nonce: Bytes32): NonceEntry | undefined {
    return this.engine.authorizationEntry(authorizer, nonce);
  }

  transferWithAuthorization(
    auth: SignedTransferAuthorization,
    actor: string,
  ): Promise<AuthorizationReceipt> {
    return this._observe("transfer", auth.from, auth.nonce, () =>
      this.engine.transferWithAuthorization(auth, { actor }),
    );
  }

  receiveWithAuthorization(
    auth: SignedTransferAuthorization,
    caller: Address,
  ): Promise<AuthorizationReceipt> {
    return this._observe("receive", auth.from, auth.nonce, () =>
      this.engine.receiveWithAuthorization(auth, caller),
    );
  }

  cancelAuthorization(
    cancel: SignedCancelAuthorization,
    actor: string,
  ): Promise<AuthorizationReceipt> {
    return this._observe("cancel", cancel.authorizer, cancel.nonce, () =>
      this.engine.cancelAuthorization(cancel, { actor }),
    );
  }

  // ─── Ledger ────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this.ledger.balanceOf(account);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  // ─── Health ────────────────────────────────────────────────────────

  /**
   * Deep health: notification hash chain and ledger supply accounting.
   */
  checkHealth(): HealthReport {
    const integrity = this.eventStore.verifyIntegrity();
    const held = this.ledger.holders().reduce((sum, h) => sum + h.balance, 0n);
    const supplyConsistent = held === this.ledger.totalSupply;
    return {
      ready: this._ready && integrity.valid && supplyConsistent,
      integrity,
      supplyConsistent,
    };
  }

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _mintGenesis(genesis: GenesisMint, generateId: () => string, timestamp: string): void {
    const to = getAddress(genesis.holder);
    this.ledger.mint(to, genesis.supply);
    const correlationId = generateId();
    this.eventStore.append(
      LEDGER_STREAM,
      [
        {
          type: PRESIGN_EVENTS.LEDGER_MINT,
          metadata: {
            eventId: generateId(),
            timestamp,
            actor: "genesis",
            correlationId,
            source: "ledger",
          },
          payload: { to, value: genesis.supply.toString() },
        },
      ],
      { expectedVersion: "no_stream" },
    );
  }

  private async _observe(
    operation: AuthorizationOperation,
    authorizer: Address,
    nonce: Bytes32,
    run: () => Promise<AuthorizationReceipt>,
  ): Promise<AuthorizationReceipt> {
    const start = performance.now();
    const report = (outcome: string): void => {
      this._onOutcome?.({
        operation,
        authorizer,
        nonce,
        outcome,
        durationMs: performance.now() - start,
      });
    };

    let receipt: AuthorizationReceipt;
    try {
      receipt = await run();
    } catch (err) {
      report(errorCode(err));
      throw err;
    }
    report("ok");
    return receipt;
  }
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "INTERNAL_ERROR";
}
