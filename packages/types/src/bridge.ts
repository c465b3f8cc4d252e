/**
 * Bridge Types
 *
 * Transfer records and lifecycle states shared by both ledger variants
 * (burn-and-mint token, lock-and-release vault) and by off-system
 * consumers such as a relayer.
 */

import type { Address, Amount, ChainTag, TransferId } from "./identity.js";

/**
 * Lifecycle of a bridge contract.
 *
 * - "active" — normal operation
 * - "paused" — outbound blocked (reversible)
 * - "halted" — terminal, entered once by relinquish
 */
export type LifecycleState = "active" | "paused" | "halted";

/**
 * Direction of a bridge transfer relative to the emitting ledger.
 */
export type BridgeDirection = "out" | "in";

/**
 * An outbound transfer as announced by a ledger.
 */
export interface BridgeOutRecord {
  readonly from: Address;
  readonly amount: Amount;
  readonly target: Address;
  readonly chainTag: ChainTag;
  readonly destinationChainTag: ChainTag;
  /** Unix seconds */
  readonly timestamp: number;
}

/**
 * An inbound settlement as recorded by a ledger.
 */
export interface BridgeInRecord {
  readonly recipient: Address;
  readonly amount: Amount;
  readonly chainTag: ChainTag;
  readonly transferId: TransferId;
  readonly sourceChainTag: ChainTag;
  /** Unix seconds */
  readonly timestamp: number;
}
