/**
 * Bridge Types
 *
 * Configuration, the public contract surface shared by both variants,
 * and errors.
 */

import type { Address, Amount, ChainTag, Hex, TransferId } from "@twinledger/types";
import type { Operation, OperationCodeTable } from "@twinledger/governance";

// =============================================================================
// Defaults
// =============================================================================

/** 10 000 tokens at 18 decimals. */
export const DEFAULT_MAX_BRIDGE_IN_AMOUNT: Amount = 10_000n * 10n ** 18n;

/** Seconds between two inbound settlements. */
export const DEFAULT_BRIDGE_IN_COOLDOWN = 60;

/** Settled transfer ids remembered for replay protection. */
export const REPLAY_CAPACITY = 100;

// =============================================================================
// Configuration
// =============================================================================

export interface BridgeContractConfig {
  /** Exactly four signer identities */
  readonly signers: readonly string[];

  /** Fixed at deployment; may coincide with a signer */
  readonly administrator: string;

  /** Operation codes; defaults to the variant's table */
  readonly codes?: OperationCodeTable;

  /** Initial bridge caller; default: unset (zero address) */
  readonly bridgeInCaller?: string;

  /** Per-transfer cap in base units. Default: DEFAULT_MAX_BRIDGE_IN_AMOUNT */
  readonly maxBridgeInAmount?: Amount;

  /** Default: DEFAULT_BRIDGE_IN_COOLDOWN */
  readonly bridgeInCooldown?: number;

  /** Default: REPLAY_CAPACITY */
  readonly replayCapacity?: number;
}

// =============================================================================
// Public Surface
// =============================================================================

/**
 * Entry points and views every deployed bridge contract exposes,
 * whatever its value policy.
 */
export interface BridgeLedger {
  readonly address: Address;

  // Governance
  requestOperation(caller: Address, operationType: number, target: string, value: bigint, data?: string): Hex;
  getOperationHash(operationId: Hex): Hex;
  submitSignature(caller: Address, operationId: Hex, signature: string): Promise<Operation>;
  isOperationExpired(operationId: Hex): boolean;
  getOperation(operationId: Hex): Operation | undefined;
  isSigner(identity: string): boolean;

  // Value movement
  bridgeOut(
    caller: Address,
    amount: Amount,
    target: string,
    chainTag: ChainTag,
    destinationChainTag?: ChainTag,
  ): void;
  bridgeIn(
    caller: Address,
    recipient: string,
    amount: Amount,
    chainTag: ChainTag,
    transferId: TransferId,
    sourceChainTag?: ChainTag,
  ): void;

  // Views
  getVaultBalance(): Amount;
  getChainId(): ChainTag;
  isProcessed(transferId: TransferId): boolean;
  readonly bridgeInCaller: Address;
  readonly maxBridgeInAmount: Amount;
  readonly bridgeInCooldown: number;
  readonly bridgeInEnabled: boolean;
  readonly bridgeOutEnabled: boolean;
  readonly paused: boolean;
  readonly halted: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type BridgeErrorCode =
  | "ZERO_AMOUNT"
  | "AMOUNT_EXCEEDS_LIMIT"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_CUSTODY"
  | "BRIDGE_IN_DISABLED"
  | "BRIDGE_OUT_DISABLED"
  | "INVALID_CHAIN_TAG"
  | "SAME_CHAIN_DESTINATION"
  | "INVALID_ADDRESS"
  | "INVALID_TRANSFER_ID"
  | "COOLDOWN_NOT_MET"
  | "ALREADY_PROCESSED"
  | "NOT_BRIDGE_CALLER"
  | "PAUSED"
  | "NOT_PAUSED"
  | "HALTED"
  | "NOTHING_TO_RELINQUISH"
  | "REENTRANT_CALL"
  | "INVALID_CONFIGURATION";

/**
 * Structured error from a bridge contract.
 */
export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
  }
}
