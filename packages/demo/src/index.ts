#!/usr/bin/env node
/**
 * @presign/demo — Interactive CLI walkthrough.
 *
 * Runs a signed-authorization session in your terminal:
 * fund -> sign -> relay -> replay -> receive -> cancel -> expire -> audit
 *
 * Uses real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { MAX_UINT256 } from "@presign/types";
import type { Address, Bytes32, Hex } from "@presign/types";
import {
  addressOf,
  signCancelAuthorization,
  signReceiveAuthorization,
  signTransferAuthorization,
} from "@presign/typed-data";
import { TokenLedger } from "@presign/ledger";
import { InMemoryEventStore, createPresignCatalog } from "@presign/event-store";
import { AuthorizationEngine, AuthorizationError, ManualClock, toIsoTimestamp } from "@presign/authorization";
import { labelCell } from "./format.js";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      PRESIGN DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Signed authorizations, relayed by anyone        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(50 - title.length));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(labelCell(label)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(labelCell(label)) + chalk.yellow(short));
}

function refused(msg: string): void {
  console.log(chalk.red("    ✗ ") + chalk.white(msg));
}

/** Run a submission that should be refused and print the refusal code. */
async function expectRefusal(label: string, attempt: () => Promise<unknown>): Promise<string> {
  try {
    await attempt();
  } catch (err) {
    if (err instanceof AuthorizationError) {
      refused(`${label}: ${chalk.yellow(err.code)}`);
      return err.code;
    }
    throw err;
  }
  throw new Error(`${label} was accepted but should have been refused`);
}

function units(value: bigint): string {
  const whole = value / 1_000_000n;
  const fraction = (value % 1_000_000n).toString().padStart(6, "0");
  return `${whole.toLocaleString("en-US")}.${fraction} PUSD`;
}

const TOTAL_STEPS = 8;

// Placeholder keys; never use these for anything real
const SIGNER_KEY: Hex = `0x${"11".repeat(32)}`;
const PAYEE_KEY: Hex = `0x${"22".repeat(32)}`;
const MERCHANT_KEY: Hex = `0x${"33".repeat(32)}`;

const nonce = (byte: string): Bytes32 => `0x${byte.repeat(32)}`;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  A token holder signs; a relayer pays the way; the ledger moves."));
  console.log(chalk.gray("  Every step runs the real domain packages, no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const clock = new ManualClock(1_700_000_000n);
  const now = (): string => toIsoTimestamp(clock.now());

  const ledger = new TokenLedger({
    metadata: { name: "Presign Dollar", version: "1", symbol: "PUSD", decimals: 6 },
    now,
  });
  const eventStore = new InMemoryEventStore({ catalog: createPresignCatalog(), now });
  const engine = new AuthorizationEngine({
    domain: {
      name: "Presign Dollar",
      version: "1",
      chainId: 1n,
      verifyingContract: "0x5FbDB2315678afecb367f032d93F642f64180aa3",
    },
    ledger,
    eventStore,
    clock,
  });

  const signer: Address = addressOf(SIGNER_KEY);
  const payee: Address = addressOf(PAYEE_KEY);
  const merchant: Address = addressOf(MERCHANT_KEY);

  ledger.mint(signer, 10_000_000_000_000n);
  ok("Ledger, notification log and engine initialized");
  info("Signer", signer);
  info("Payee", payee);
  info("Merchant", merchant);
  info("Signer balance", units(ledger.balanceOf(signer)));
  hashLine("Domain sep.", engine.domainSeparator);

  await sleep(DELAY_MS);

  // ─── Step 2: Sign ───────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Sign Transfer Authorization");

  const transfer = await signTransferAuthorization(
    engine.domainSeparator,
    {
      from: signer,
      to: payee,
      value: 7_000_000_000_000n,
      validAfter: 0n,
      validBefore: MAX_UINT256,
      nonce: nonce("a1"),
    },
    SIGNER_KEY,
  );
  ok(`Signer authorizes ${units(transfer.value)} to the payee, off-line`);
  hashLine("Nonce", transfer.nonce);
  info("Signature v", String(transfer.signature.v));
  hashLine("Signature r", transfer.signature.r);

  await sleep(DELAY_MS);

  // ─── Step 3: Relay ──────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Relay");

  const receipt = await engine.transferWithAuthorization(transfer, { actor: "relayer" });
  ok("An unrelated relayer submitted the authorization");
  info("Events", receipt.events.map((e) => e.event.type).join(", "));
  info("Signer balance", units(ledger.balanceOf(signer)));
  info("Payee balance", units(ledger.balanceOf(payee)));
  info("Nonce used", String(engine.authorizationState(signer, transfer.nonce)));

  await sleep(DELAY_MS);

  // ─── Step 4: Replay ─────────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Replay");

  await expectRefusal("Same authorization again", () =>
    engine.transferWithAuthorization(transfer, { actor: "relayer" }),
  );
  ok("Each nonce moves value at most once");

  await sleep(DELAY_MS);

  // ─── Step 5: Receive ────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Receive (payee-submitted)");

  const receive = await signReceiveAuthorization(
    engine.domainSeparator,
    {
      from: signer,
      to: merchant,
      value: 250_000_000n,
      validAfter: 0n,
      validBefore: MAX_UINT256,
      nonce: nonce("b2"),
    },
    SIGNER_KEY,
  );

  await expectRefusal("Front-run by the payee of step 3", () => engine.receiveWithAuthorization(receive, payee));
  await engine.receiveWithAuthorization(receive, merchant);
  ok(`Merchant pulled ${units(receive.value)}`);
  info("Merchant balance", units(ledger.balanceOf(merchant)));

  await sleep(DELAY_MS);

  // ─── Step 6: Cancel ─────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Cancel");

  const pendingNonce = nonce("c3");
  const cancel = await signCancelAuthorization(
    engine.domainSeparator,
    { authorizer: signer, nonce: pendingNonce },
    SIGNER_KEY,
  );
  await engine.cancelAuthorization(cancel, { actor: "relayer" });
  ok("Signer canceled a nonce before anyone used it");

  const late = await signTransferAuthorization(
    engine.domainSeparator,
    { from: signer, to: payee, value: 1n, validAfter: 0n, validBefore: MAX_UINT256, nonce: pendingNonce },
    SIGNER_KEY,
  );
  await expectRefusal("Transfer on the canceled nonce", () =>
    engine.transferWithAuthorization(late, { actor: "relayer" }),
  );

  await sleep(DELAY_MS);

  // ─── Step 7: Expire ─────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Validity Window");

  const shortLived = await signTransferAuthorization(
    engine.domainSeparator,
    {
      from: signer,
      to: payee,
      value: 1_000_000n,
      validAfter: 0n,
      validBefore: clock.now() + 60n,
      nonce: nonce("d4"),
    },
    SIGNER_KEY,
  );
  info("Valid before", toIsoTimestamp(shortLived.validBefore));
  clock.advance(120n);
  info("Clock now", now());
  await expectRefusal("Submitted two minutes later", () =>
    engine.transferWithAuthorization(shortLived, { actor: "relayer" }),
  );
  info("Nonce used", String(engine.authorizationState(signer, shortLived.nonce)));

  await sleep(DELAY_MS);

  // ─── Step 8: Audit ──────────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Audit");

  const allEvents = eventStore.readAll();
  for (const se of allEvents) {
    const line = JSON.stringify({
      type: se.event.type,
      stream: se.streamId,
      hash: se.hash.slice(0, 12) + "...",
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }

  const integrity = eventStore.verifyIntegrity();
  if (integrity.valid) {
    ok(`Hash chain intact through position ${integrity.lastVerifiedPosition}`);
  } else {
    refused(`Hash chain broken: ${integrity.errors.length} error(s)`);
  }

  const held = ledger.holders().reduce((sum, h) => sum + h.balance, 0n);

  console.log();
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(allEvents.length)));
  console.log(chalk.white("    Total supply:        ") + chalk.cyan.bold(units(ledger.totalSupply)));
  console.log(chalk.white("    Sum of balances:     ") + chalk.cyan.bold(units(held)));
  console.log();
  console.log(chalk.gray("    Only the signer's key can move the signer's funds;"));
  console.log(chalk.gray("    anyone can carry the message."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
