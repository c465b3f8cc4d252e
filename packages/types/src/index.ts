/**
 * @twinledger/types — Shared domain types for the twinledger stack.
 *
 * These types are used across all twinledger packages:
 * - Identities, digests and chain tags
 * - Bridge transfer records and lifecycle states
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Identity types
export type {
  Address,
  Hex,
  ChainTag,
  TransferId,
  Amount,
} from "./identity.js";
export { ZERO_ADDRESS, DEFAULT_CHAIN_TAG } from "./identity.js";

// Bridge types
export type {
  LifecycleState,
  BridgeDirection,
  BridgeOutRecord,
  BridgeInRecord,
} from "./bridge.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isHex,
  isTransferId,
  isUintString,
  isLifecycleState,
} from "./guards.js";
