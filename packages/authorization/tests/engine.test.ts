/**
 * Tests for the AuthorizationEngine.
 *
 * Covers:
 * - End-to-end third-party transfer
 * - Resubmission and shared-nonce rejection
 * - Cross-type and cross-domain rejection
 * - Validity window edges
 * - Payee gating for receive
 * - Field tampering
 * - Cancellation
 * - Malformed signatures and inputs
 * - Notification log integrity and replay
 */

import { describe, it, expect, beforeEach } from "vitest";
import { hexToBigInt, numberToHex } from "viem";
import { SECP256K1_N, bindDomain } from "@presign/typed-data";
import { NonceRegistry } from "../src/nonce-registry.js";
import { authorizerStream } from "../src/engine.js";
import { AuthorizationError } from "../src/types.js";
import type { Harness } from "./harness.js";
import {
  ALICE,
  ALICE_KEY,
  BOB,
  BOB_KEY,
  CAROL,
  DOMAIN,
  NONCE_A,
  NONCE_B,
  NOW,
  NOW_ISO,
  createHarness,
  signCancel,
  signReceive,
  signTransfer,
} from "./harness.js";

async function expectCode(promise: Promise<unknown>, code: string): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(Error);
  await promise.catch((err: unknown) => {
    expect(err).toMatchObject({ code });
  });
}

let h: Harness;

beforeEach(() => {
  h = createHarness();
});

// ─── End to End ──────────────────────────────────────────────────────────

describe("end-to-end transfer", () => {
  it("moves 7,000,000 from signer to recipient when a third party submits", async () => {
    const signed = await signTransfer();

    const receipt = await h.engine.transferWithAuthorization(signed, { actor: CAROL });

    expect(h.ledger.balanceOf(ALICE)).toBe(3_000_000n);
    expect(h.ledger.balanceOf(BOB)).toBe(7_000_000n);
    expect(h.engine.authorizationState(ALICE, NONCE_A)).toBe(true);

    expect(receipt.operation).toBe("transfer");
    expect(receipt.correlationId).toBe("id-1");
    expect(receipt.transfer).toEqual({ from: ALICE, to: BOB, value: 7_000_000n });
    expect(receipt.events.map((e) => e.event.type)).toEqual(["authorization.used", "ledger.transfer"]);
  });

  it("emits notifications with matching arguments, in order", async () => {
    await h.engine.transferWithAuthorization(await signTransfer(), { actor: CAROL });

    const [used, transfer] = h.events.read(authorizerStream(ALICE));
    expect(used?.event.payload).toEqual({ authorizer: ALICE, nonce: NONCE_A, kind: "transfer" });
    expect(used?.event.metadata).toEqual({
      eventId: "id-2",
      timestamp: NOW_ISO,
      actor: CAROL,
      correlationId: "id-1",
      source: "authorization",
    });
    expect(transfer?.event.payload).toEqual({ from: ALICE, to: BOB, value: "7000000" });
    expect(transfer?.event.metadata.causationId).toBe("id-2");
    expect(transfer?.event.metadata.source).toBe("ledger");
    expect(transfer?.globalPosition).toBe(2);
  });

  it("rejects the same authorization resubmitted, leaving balances as they were", async () => {
    const signed = await signTransfer();
    await h.engine.transferWithAuthorization(signed);

    await expectCode(h.engine.transferWithAuthorization(signed), "AUTHORIZATION_ALREADY_USED");
    expect(h.ledger.balanceOf(ALICE)).toBe(3_000_000n);
    expect(h.ledger.balanceOf(BOB)).toBe(7_000_000n);
    expect(h.events.globalPosition()).toBe(2);
  });

  it("rejects any authorization sharing (signer, nonce) even with different fields", async () => {
    await h.engine.transferWithAuthorization(await signTransfer());

    const different = await signTransfer({ to: CAROL, value: 1n });
    await expectCode(h.engine.transferWithAuthorization(different), "AUTHORIZATION_ALREADY_USED");
  });

  it("checks the nonce before the time window", async () => {
    await h.engine.transferWithAuthorization(await signTransfer());
    const expired = await signTransfer({ validBefore: 1n });
    await expectCode(h.engine.transferWithAuthorization(expired), "AUTHORIZATION_ALREADY_USED");
  });

  it("keeps the notification hash chain intact", async () => {
    await h.engine.transferWithAuthorization(await signTransfer({ value: 1n }));
    await h.engine.transferWithAuthorization(await signTransfer({ value: 2n, nonce: NONCE_B }));
    await h.engine.cancelAuthorization(await signCancel(BOB, NONCE_A, BOB_KEY));

    const integrity = h.events.verifyIntegrity();
    expect(integrity.valid).toBe(true);
    expect(integrity.lastVerifiedPosition).toBe(5);
  });
});

// ─── Cross-type ──────────────────────────────────────────────────────────

describe("cross-type rejection", () => {
  it("rejects a receive signature submitted as a transfer", async () => {
    const signed = await signReceive();
    await expectCode(h.engine.transferWithAuthorization(signed), "INVALID_SIGNATURE");
    expect(h.engine.authorizationState(ALICE, NONCE_A)).toBe(false);
  });

  it("rejects a transfer signature submitted as a receive", async () => {
    const signed = await signTransfer();
    await expectCode(h.engine.receiveWithAuthorization(signed, BOB), "INVALID_SIGNATURE");
  });

  it("rejects a cancel signature on transfer and receive", async () => {
    const cancel = await signCancel(ALICE, NONCE_A);
    const withCancelSig = { ...(await signTransfer()), signature: cancel.signature };

    await expectCode(h.engine.transferWithAuthorization(withCancelSig), "INVALID_SIGNATURE");
    await expectCode(h.engine.receiveWithAuthorization(withCancelSig, BOB), "INVALID_SIGNATURE");
    expect(h.ledger.balanceOf(ALICE)).toBe(10_000_000n);
  });
});

// ─── Validity Window ─────────────────────────────────────────────────────

describe("validity window", () => {
  it("rejects validAfter in the future", async () => {
    const signed = await signTransfer({ validAfter: NOW + 1n });
    await expectCode(h.engine.transferWithAuthorization(signed), "AUTHORIZATION_NOT_YET_VALID");
  });

  it("accepts validAfter equal to now", async () => {
    const signed = await signTransfer({ validAfter: NOW });
    await expect(h.engine.transferWithAuthorization(signed)).resolves.toMatchObject({ operation: "transfer" });
  });

  it("rejects validBefore equal to now", async () => {
    const signed = await signTransfer({ validBefore: NOW });
    await expectCode(h.engine.transferWithAuthorization(signed), "AUTHORIZATION_EXPIRED");
  });

  it("rejects validBefore in the past", async () => {
    const signed = await signTransfer({ validBefore: NOW - 1n });
    await expectCode(h.engine.transferWithAuthorization(signed), "AUTHORIZATION_EXPIRED");
  });

  it("accepts validBefore one second ahead", async () => {
    const signed = await signTransfer({ validBefore: NOW + 1n });
    await expect(h.engine.transferWithAuthorization(signed)).resolves.toBeDefined();
  });

  it("becomes valid once the clock reaches validAfter", async () => {
    const signed = await signTransfer({ validAfter: NOW + 60n });
    await expectCode(h.engine.transferWithAuthorization(signed), "AUTHORIZATION_NOT_YET_VALID");

    h.clock.advance(60n);
    await h.engine.transferWithAuthorization(signed);
    expect(h.engine.authorizationState(ALICE, NONCE_A)).toBe(true);
  });
});

// ─── Receive ─────────────────────────────────────────────────────────────

describe("receiveWithAuthorization", () => {
  it("succeeds when the payee submits", async () => {
    const receipt = await h.engine.receiveWithAuthorization(await signReceive(), BOB);

    expect(receipt.operation).toBe("receive");
    expect(h.ledger.balanceOf(BOB)).toBe(7_000_000n);
    expect(receipt.events[0]?.event.payload).toEqual({ authorizer: ALICE, nonce: NONCE_A, kind: "receive" });
    expect(receipt.events[0]?.event.metadata.actor).toBe(BOB);
  });

  it("matches the payee case-insensitively", async () => {
    await expect(
      h.engine.receiveWithAuthorization(await signReceive(), `0x${BOB.slice(2).toLowerCase()}`),
    ).resolves.toBeDefined();
  });

  it("rejects any other caller", async () => {
    const signed = await signReceive();
    await expectCode(h.engine.receiveWithAuthorization(signed, CAROL), "CALLER_NOT_PAYEE");
    await expectCode(h.engine.receiveWithAuthorization(signed, ALICE), "CALLER_NOT_PAYEE");
    expect(h.engine.authorizationState(ALICE, NONCE_A)).toBe(false);
  });

  it("checks the payee before the nonce state", async () => {
    const signed = await signReceive();
    await h.engine.receiveWithAuthorization(signed, BOB);
    await expectCode(h.engine.receiveWithAuthorization(signed, CAROL), "CALLER_NOT_PAYEE");
  });
});

// ─── Tampering ───────────────────────────────────────────────────────────

describe("field tampering", () => {
  const mutations = [
    ["value", { value: 7_000_001n }],
    ["from", { from: BOB }],
    ["to", { to: CAROL }],
    ["validAfter", { validAfter: 1n }],
    ["validBefore", { validBefore: NOW + 3600n }],
    ["nonce", { nonce: NONCE_B }],
  ] as const;

  for (const [field, change] of mutations) {
    it(`rejects a changed ${field} as INVALID_SIGNATURE`, async () => {
      const signed = await signTransfer();
      await expectCode(h.engine.transferWithAuthorization({ ...signed, ...change }), "INVALID_SIGNATURE");
      expect(h.ledger.balanceOf(ALICE)).toBe(10_000_000n);
    });
  }

  it("rejects a signature from someone other than from", async () => {
    const signed = await signTransfer({}, BOB_KEY);
    await expectCode(h.engine.transferWithAuthorization(signed), "INVALID_SIGNATURE");
  });
});

// ─── Cross-domain ────────────────────────────────────────────────────────

describe("cross-domain rejection", () => {
  const variants = [
    ["name", { ...DOMAIN, name: "Other Dollar" }],
    ["version", { ...DOMAIN, version: "2" }],
    ["chainId", { ...DOMAIN, chainId: 5n }],
    ["verifyingContract", { ...DOMAIN, verifyingContract: "0x0000000000000000000000000000000000000001" }],
  ] as const;

  for (const [field, domain] of variants) {
    it(`rejects a signature made under a different ${field}`, async () => {
      const signed = await signTransfer({}, ALICE_KEY, bindDomain(domain));
      await expectCode(h.engine.transferWithAuthorization(signed), "INVALID_SIGNATURE");
    });
  }
});

// ─── Cancel ──────────────────────────────────────────────────────────────

describe("cancelAuthorization", () => {
  it("burns the nonce and emits one notification", async () => {
    const receipt = await h.engine.cancelAuthorization(await signCancel(ALICE, NONCE_A));

    expect(h.engine.authorizationState(ALICE, NONCE_A)).toBe(true);
    expect(h.engine.authorizationEntry(ALICE, NONCE_A)).toEqual({
      authorizer: ALICE,
      nonce: NONCE_A,
      consumption: "canceled",
      consumedAt: NOW_ISO,
    });
    expect(receipt.transfer).toBeUndefined();
    expect(receipt.events).toHaveLength(1);
    expect(receipt.events[0]?.event.type).toBe("authorization.canceled");
    expect(receipt.events[0]?.event.payload).toEqual({ authorizer: ALICE, nonce: NONCE_A });
  });

  it("blocks later transfer and receive of the canceled nonce", async () => {
    await h.engine.cancelAuthorization(await signCancel(ALICE, NONCE_A));

    await expectCode(h.engine.transferWithAuthorization(await signTransfer()), "AUTHORIZATION_ALREADY_USED");
    await expectCode(h.engine.receiveWithAuthorization(await signReceive(), BOB), "AUTHORIZATION_ALREADY_USED");
    expect(h.ledger.balanceOf(ALICE)).toBe(10_000_000n);
    expect(h.ledger.balanceOf(BOB)).toBe(0n);
  });

  it("cannot cancel a used nonce", async () => {
    await h.engine.transferWithAuthorization(await signTransfer());
    await expectCode(h.engine.cancelAuthorization(await signCancel(ALICE, NONCE_A)), "AUTHORIZATION_ALREADY_USED");
  });

  it("cannot cancel twice", async () => {
    const cancel = await signCancel(ALICE, NONCE_A);
    await h.engine.cancelAuthorization(cancel);
    await expectCode(h.engine.cancelAuthorization(cancel), "AUTHORIZATION_ALREADY_USED");
  });

  it("rejects a cancellation signed by someone else", async () => {
    await expectCode(h.engine.cancelAuthorization(await signCancel(ALICE, NONCE_A, BOB_KEY)), "INVALID_SIGNATURE");
    expect(h.engine.authorizationState(ALICE, NONCE_A)).toBe(false);
  });

  it("rejects a transfer signature used as a cancellation", async () => {
    const transfer = await signTransfer();
    await expectCode(
      h.engine.cancelAuthorization({ authorizer: ALICE, nonce: NONCE_A, signature: transfer.signature }),
      "INVALID_SIGNATURE",
    );
  });
});

// ─── Malformed Input ─────────────────────────────────────────────────────

describe("malformed signatures and input", () => {
  it("rejects the high-s twin of a valid signature", async () => {
    const signed = await signTransfer();
    const highS = {
      ...signed,
      signature: {
        r: signed.signature.r,
        s: numberToHex(SECP256K1_N - hexToBigInt(signed.signature.s), { size: 32 }),
        v: signed.signature.v === 27 ? 28 : 27,
      },
    };
    await expectCode(h.engine.transferWithAuthorization(highS), "INVALID_SIGNATURE");
  });

  it("rejects v outside 27/28", async () => {
    const signed = await signTransfer();
    await expectCode(
      h.engine.transferWithAuthorization({ ...signed, signature: { ...signed.signature, v: 1 } }),
      "INVALID_SIGNATURE",
    );
  });

  it("wraps the typed-data failure as the cause", async () => {
    const signed = await signTransfer();
    const err = await h.engine
      .transferWithAuthorization({ ...signed, signature: { ...signed.signature, v: 30 } })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthorizationError);
    expect(err).toMatchObject({ code: "INVALID_SIGNATURE", cause: { name: "TypedDataError" } });
  });

  it("rejects a malformed nonce before touching state", async () => {
    const signed = await signTransfer();
    await expectCode(
      h.engine.transferWithAuthorization({ ...signed, nonce: "0x1234" }),
      "INVALID_AUTHORIZATION",
    );
  });

  it("rejects a negative value", async () => {
    const signed = await signTransfer();
    await expectCode(h.engine.transferWithAuthorization({ ...signed, value: -1n }), "INVALID_AUTHORIZATION");
  });
});

// ─── Queries and Replay ──────────────────────────────────────────────────

describe("queries", () => {
  it("exposes the domain separator and type hashes", () => {
    expect(h.engine.domainSeparator).toBe(bindDomain(DOMAIN));
    expect(h.engine.typeHashes.transfer).toBe(
      "0x7c7c6cdb67a18743f49ec6fa9b35f50d52ed05cbed4cc592e13b44501c1a2267",
    );
  });

  it("reports unused nonces as false", () => {
    expect(h.engine.authorizationState(ALICE, NONCE_A)).toBe(false);
    expect(h.engine.authorizationEntry(ALICE, NONCE_A)).toBeUndefined();
  });

  it("rebuilds the same registry from the notification log", async () => {
    await h.engine.transferWithAuthorization(await signTransfer({ value: 5n }));
    await h.engine.cancelAuthorization(await signCancel(ALICE, NONCE_B));

    const replayed = NonceRegistry.fromEvents(h.events.readAll());
    expect(replayed.snapshot()).toEqual(h.engine.registry.snapshot());
  });

  it("exposes a registry that cannot release a committed nonce", async () => {
    const signed = await signTransfer({ value: 5n });
    await h.engine.transferWithAuthorization(signed);

    const view = h.engine.registry;
    expect("rollback" in view).toBe(false);
    expect("markUsed" in view).toBe(false);
    expect("release" in view).toBe(false);
    expect(view.isUsed(ALICE, NONCE_A)).toBe(true);

    await expectCode(h.engine.transferWithAuthorization(signed), "AUTHORIZATION_ALREADY_USED");
    expect(h.ledger.balanceOf(BOB)).toBe(5n);
    expect(NonceRegistry.fromEvents(h.events.readAll()).snapshot()).toEqual(view.snapshot());
  });
});
