/**
 * @presign/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import type { Address } from "@presign/types";
import { isRole } from "./types/auth.js";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const AddressEnv = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "must be a 20-byte hex address")
  .transform((v) => getAddress(v));

const UintEnv = z
  .string()
  .regex(/^\d+$/, "must be a non-negative decimal integer")
  .transform((v) => BigInt(v));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().optional(),
  JWT_ISSUER: z.string().default("presign"),

  // Token and signing domain
  TOKEN_NAME: z.string().min(1).default("Presign Dollar"),
  TOKEN_VERSION: z.string().min(1).default("1"),
  TOKEN_SYMBOL: z.string().min(1).default("PUSD"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(77).default(6),
  CHAIN_ID: UintEnv.default("1"),
  VERIFYING_CONTRACT: AddressEnv.default("0x5FbDB2315678afecb367f032d93F642f64180aa3"),

  // Genesis mint
  GENESIS_HOLDER: AddressEnv.optional(),
  GENESIS_SUPPLY: UintEnv.default("0"),

  // Rate limiting
  RATE_LIMIT_RPM: z.coerce.number().int().min(1).default(100),
  RATE_LIMIT_BURST: z.coerce.number().int().min(1).default(20),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  /** Address the key submits as; the caller of receive operations */
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:address1,key2:role2:address2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, address, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || address === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (!isAddress(address, { strict: false })) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    keys.push({ key, role, address: getAddress(address) });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
