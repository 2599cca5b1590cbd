/**
 * @presign/typed-data — Domain binding.
 *
 * The domain separator pins a signature to one token name, version,
 * chain and contract. Computed once when an engine is built.
 */

import { encodeAbiParameters, getAddress, isAddress, keccak256, stringToHex } from "viem";
import { MAX_UINT256 } from "@presign/types";
import type { Bytes32 } from "@presign/types";
import { EIP712_DOMAIN_TYPEHASH } from "./type-hashes.js";
import { TypedDataError } from "./types.js";
import type { DomainParams } from "./types.js";

/**
 * Compute the domain separator for a token instance.
 *
 * @throws TypedDataError INVALID_DOMAIN on an empty name or version, a
 *   malformed contract address, or a chain id outside uint256
 */
export function bindDomain(params: DomainParams): Bytes32 {
  if (params.name === "" || params.version === "") {
    throw new TypedDataError("INVALID_DOMAIN", "Domain name and version must be non-empty");
  }
  if (!isAddress(params.verifyingContract, { strict: false })) {
    throw new TypedDataError(
      "INVALID_DOMAIN",
      `Invalid verifying contract: ${params.verifyingContract}`,
    );
  }
  if (params.chainId < 0n || params.chainId > MAX_UINT256) {
    throw new TypedDataError(
      "INVALID_DOMAIN",
      `Chain id out of range: ${params.chainId.toString()}`,
    );
  }

  return keccak256(
    encodeAbiParameters(
      [
        { type: "bytes32" },
        { type: "bytes32" },
        { type: "bytes32" },
        { type: "uint256" },
        { type: "address" },
      ],
      [
        EIP712_DOMAIN_TYPEHASH,
        keccak256(stringToHex(params.name)),
        keccak256(stringToHex(params.version)),
        params.chainId,
        getAddress(params.verifyingContract),
      ],
    ),
  );
}
