/**
 * @twinledger/node — Configuration.
 *
 * Loads and validates deployment configuration from environment
 * variables using Zod.
 */

import { getAddress, isAddress } from "viem";
import { z } from "zod";
import type { Address } from "@twinledger/types";
import {
  DEFAULT_BRIDGE_IN_COOLDOWN,
  DEFAULT_MAX_BRIDGE_IN_AMOUNT,
  REPLAY_CAPACITY,
} from "@twinledger/bridge";

// =============================================================================
// Field Types
// =============================================================================

const uintString = z.string().trim().regex(/^\d+$/, "Expected a non-negative integer");

const bigUint = uintString.transform((v) => BigInt(v));

const address = z
  .string()
  .trim()
  .refine((v) => isAddress(v, { strict: false }), "Expected a 20-byte hex address")
  .transform((v) => getAddress(v));

const flag = z
  .string()
  .transform((v) => v === "true")
  .default("false");

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Chains
    CHAIN_ID_PRIMARY: bigUint.default("31337"),
    CHAIN_ID_SECONDARY: bigUint.default("31338"),

    // Governance
    SIGNERS: z
      .string()
      .transform((v) =>
        v
          .split(",")
          .map((s) => s.trim())
          .filter((s) => s !== ""),
      )
      .pipe(z.tuple([address, address, address, address])),
    ADMINISTRATOR: address.optional(),

    // Bridge
    BRIDGE_IN_CALLER: address.optional(),
    MAX_BRIDGE_IN_AMOUNT: bigUint.default(DEFAULT_MAX_BRIDGE_IN_AMOUNT.toString()),
    BRIDGE_IN_COOLDOWN_SECONDS: z.coerce.number().int().min(0).default(DEFAULT_BRIDGE_IN_COOLDOWN),
    REPLAY_CAPACITY: z.coerce.number().int().min(1).default(REPLAY_CAPACITY),
    VAULT_PAUSE_BLOCKS_INBOUND: flag,

    // Origin token
    TOKEN_NAME: z.string().min(1).default("Twin Token"),
    TOKEN_SYMBOL: z.string().min(1).default("TWIN"),
    TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
    ORIGIN_SUPPLY: bigUint.default("1000000000000000000000000"),

    // Relayer
    RELAY_INTERVAL_MS: z.coerce.number().int().min(100).default(5000),
  })
  .refine((c) => c.CHAIN_ID_PRIMARY !== c.CHAIN_ID_SECONDARY, {
    message: "Primary and secondary chain ids must differ",
    path: ["CHAIN_ID_SECONDARY"],
  })
  .refine((c) => c.CHAIN_ID_PRIMARY !== 0n && c.CHAIN_ID_SECONDARY !== 0n, {
    message: "Chain id 0 is reserved",
    path: ["CHAIN_ID_PRIMARY"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

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

/**
 * The administrator identity: ADMINISTRATOR, or the first signer.
 */
export function administratorOf(config: AppConfig): Address {
  return config.ADMINISTRATOR ?? config.SIGNERS[0];
}
