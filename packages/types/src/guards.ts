/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * These enable safe runtime validation at system boundaries
 * (event payloads, relayer input).
 */

import type { Address, Hex, TransferId } from "./identity.js";
import type { LifecycleState } from "./bridge.js";

// =============================================================================
// Identity guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const HEX_PATTERN = /^0x([0-9a-fA-F]{2})*$/;
const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function isTransferId(value: unknown): value is TransferId {
  return typeof value === "string" && BYTES32_PATTERN.test(value);
}

/**
 * Decimal string of a non-negative integer, as amounts and chain tags
 * appear in event payloads.
 */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && /^(0|[1-9]\d*)$/.test(value);
}

// =============================================================================
// Lifecycle guards
// =============================================================================

const LIFECYCLE_STATES = new Set<string>(["active", "paused", "halted"]);

export function isLifecycleState(value: unknown): value is LifecycleState {
  return typeof value === "string" && LIFECYCLE_STATES.has(value);
}
