/**
 * Operation code tables and payload decoding.
 */

import { decodeAbiParameters, encodeAbiParameters, getAddress, maxUint160, size, toHex } from "viem";
import type { Address, Hex } from "@twinledger/types";
import type { OperationCodeTable, OperationEffect, OperationKind } from "./types.js";
import { GovernanceError } from "./types.js";

// =============================================================================
// Default Code Tables
// =============================================================================

/** Default codes of the burn-and-mint token variant. */
export const BURN_MINT_OPERATION_CODES = {
  pause: 0,
  unpause: 1,
  setBridgeInCaller: 2,
  setBridgeInLimits: 3,
  updateSigner: 4,
  setBridgeInEnabled: 5,
  setBridgeOutEnabled: 6,
} as const satisfies OperationCodeTable;

/** Default codes of the lock-and-release vault variant. */
export const LOCK_RELEASE_OPERATION_CODES = {
  pause: 0,
  unpause: 1,
  setBridgeInCaller: 2,
  setBridgeInLimits: 3,
  updateSigner: 4,
  relinquish: 5,
  setBridgeOutEnabled: 6,
  setBridgeInEnabled: 7,
} as const satisfies OperationCodeTable;

/**
 * Find the kind a code stands for in `table`.
 */
export function resolveKind(table: OperationCodeTable, code: number): OperationKind | undefined {
  for (const [kind, value] of Object.entries(table)) {
    if (value === code && isOperationKind(kind)) return kind;
  }
  return undefined;
}

/**
 * Look up the code of `kind` in `table`.
 *
 * @throws GovernanceError (UNKNOWN_OPERATION_TYPE) if the table has none
 */
export function codeOf(table: OperationCodeTable, kind: OperationKind): number {
  const code = table[kind];
  if (code === undefined) {
    throw new GovernanceError("UNKNOWN_OPERATION_TYPE", `No operation code for ${kind}`);
  }
  return code;
}

/**
 * Reject tables that map two kinds to the same code, or use a code
 * outside uint8.
 */
export function assertCodeTable(table: OperationCodeTable): void {
  const codes = Object.values(table).filter((c): c is number => c !== undefined);
  for (const code of codes) {
    if (!Number.isInteger(code) || code < 0 || code > 255) {
      throw new GovernanceError("UNKNOWN_OPERATION_TYPE", `Operation code out of range: ${code}`);
    }
  }
  if (new Set(codes).size !== codes.length) {
    throw new GovernanceError("UNKNOWN_OPERATION_TYPE", "Operation code table has duplicate codes");
  }
}

const KINDS: readonly OperationKind[] = [
  "pause",
  "unpause",
  "setBridgeInCaller",
  "setBridgeInLimits",
  "updateSigner",
  "setBridgeInEnabled",
  "setBridgeOutEnabled",
  "relinquish",
];

function isOperationKind(value: string): value is OperationKind {
  return KINDS.some((k) => k === value);
}

// =============================================================================
// Payloads
// =============================================================================

/**
 * ABI-encode a cooldown for a setBridgeInLimits payload.
 */
export function encodeLimitsPayload(bridgeInCooldown: number): Hex {
  return encodeAbiParameters([{ type: "uint256" }], [BigInt(bridgeInCooldown)]);
}

/**
 * The low 160 bits of `value` as an address (UpdateSigner encodes the
 * replacement signer this way).
 */
export function addressFromValue(value: bigint): Address {
  return getAddress(toHex(value & maxUint160, { size: 20 }));
}

/**
 * Encode an address as an operation value.
 */
export function valueFromAddress(address: Address): bigint {
  return BigInt(address);
}

/**
 * Decode what an operation will do once executed.
 *
 * @throws GovernanceError (INVALID_PAYLOAD) on a malformed payload
 */
export function decodeEffect(
  kind: OperationKind,
  target: Address,
  value: bigint,
  data: Hex,
): OperationEffect {
  switch (kind) {
    case "pause":
    case "unpause":
    case "relinquish":
      return { kind };
    case "setBridgeInCaller":
      return { kind, bridgeInCaller: target };
    case "setBridgeInLimits":
      return { kind, maxBridgeInAmount: value, bridgeInCooldown: decodeCooldown(data) };
    case "updateSigner":
      return { kind, oldSigner: target, newSigner: addressFromValue(value) };
    case "setBridgeInEnabled":
    case "setBridgeOutEnabled":
      return { kind, enabled: value !== 0n };
    default: {
      const unreachable: never = kind;
      throw new GovernanceError("UNKNOWN_OPERATION_TYPE", `Unknown operation kind: ${String(unreachable)}`);
    }
  }
}

function decodeCooldown(data: Hex): number {
  if (size(data) !== 32) {
    throw new GovernanceError(
      "INVALID_PAYLOAD",
      `setBridgeInLimits payload must be one uint256, got ${size(data)} bytes`,
    );
  }
  const [cooldown] = decodeAbiParameters([{ type: "uint256" }], data);
  if (cooldown > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new GovernanceError("INVALID_PAYLOAD", `Cooldown out of range: ${cooldown}`);
  }
  return Number(cooldown);
}
