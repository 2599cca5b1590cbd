/**
 * Tests for the authorization type hashes and domain binding.
 *
 * Covers:
 * - Golden type hashes for the three message shapes
 * - Domain separator determinism and sensitivity to every field
 * - Rejection of malformed domains
 */

import { describe, it, expect } from "vitest";
import { getAddress, keccak256, stringToHex } from "viem";
import {
  CANCEL_AUTHORIZATION_TYPEHASH,
  EIP712_DOMAIN_TYPEHASH,
  RECEIVE_WITH_AUTHORIZATION_TYPEHASH,
  TRANSFER_WITH_AUTHORIZATION_TYPEHASH,
  TYPE_HASHES,
} from "../src/type-hashes.js";
import { bindDomain } from "../src/domain.js";
import { TypedDataError } from "../src/types.js";
import { DOMAIN, TOKEN_CONTRACT } from "./fixtures.js";

describe("type hashes", () => {
  it("matches the published TransferWithAuthorization type hash", () => {
    expect(TRANSFER_WITH_AUTHORIZATION_TYPEHASH).toBe(
      "0x7c7c6cdb67a18743f49ec6fa9b35f50d52ed05cbed4cc592e13b44501c1a2267",
    );
  });

  it("matches the published ReceiveWithAuthorization type hash", () => {
    expect(RECEIVE_WITH_AUTHORIZATION_TYPEHASH).toBe(
      "0xd099cc98ef71107a616c4f0f941f04c322d8e254fe26b3c6668db87aae413de8",
    );
  });

  it("matches the published CancelAuthorization type hash", () => {
    expect(CANCEL_AUTHORIZATION_TYPEHASH).toBe(
      "0x158b0a9edf7a828aad02f63cd515c68ef2f50ba807396f6d12842833a1597429",
    );
  });

  it("derives the domain type hash from its type string", () => {
    expect(EIP712_DOMAIN_TYPEHASH).toBe(
      keccak256(
        stringToHex("EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)"),
      ),
    );
  });

  it("exposes all three under TYPE_HASHES", () => {
    expect(TYPE_HASHES).toEqual({
      transfer: TRANSFER_WITH_AUTHORIZATION_TYPEHASH,
      receive: RECEIVE_WITH_AUTHORIZATION_TYPEHASH,
      cancel: CANCEL_AUTHORIZATION_TYPEHASH,
    });
    expect(Object.isFrozen(TYPE_HASHES)).toBe(true);
  });
});

describe("bindDomain", () => {
  it("is deterministic", () => {
    expect(bindDomain(DOMAIN)).toBe(bindDomain({ ...DOMAIN }));
  });

  it("returns 32 bytes", () => {
    expect(bindDomain(DOMAIN)).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it("ignores address casing", () => {
    const checksummed = { ...DOMAIN, verifyingContract: getAddress(TOKEN_CONTRACT) };
    expect(bindDomain(checksummed)).toBe(bindDomain(DOMAIN));
  });

  it("changes with every domain field", () => {
    const base = bindDomain(DOMAIN);
    expect(bindDomain({ ...DOMAIN, name: "Other Dollar" })).not.toBe(base);
    expect(bindDomain({ ...DOMAIN, version: "2" })).not.toBe(base);
    expect(bindDomain({ ...DOMAIN, chainId: 5n })).not.toBe(base);
    expect(
      bindDomain({ ...DOMAIN, verifyingContract: "0x0000000000000000000000000000000000000001" }),
    ).not.toBe(base);
  });

  it("rejects a malformed verifying contract", () => {
    expect(() => bindDomain({ ...DOMAIN, verifyingContract: "0x1234" })).toThrow(TypedDataError);
  });

  it("rejects a negative chain id", () => {
    try {
      bindDomain({ ...DOMAIN, chainId: -1n });
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(TypedDataError);
      expect((err as TypedDataError).code).toBe("INVALID_DOMAIN");
    }
  });

  it("rejects a chain id above uint256", () => {
    expect(() => bindDomain({ ...DOMAIN, chainId: 1n << 256n })).toThrow("Chain id out of range");
  });
});
