/**
 * Multi-Signature Governance Types
 *
 * Operations are administrative state changes that take effect only
 * once a fixed quorum of registered signers has signed the operation's
 * fingerprint.
 *
 * Design:
 * - All types are readonly
 * - Operation records are replaced, never mutated in place
 * - Fail-closed: every violation throws a GovernanceError
 */

import type { Address, Hex } from "@twinledger/types";

// =============================================================================
// Constants
// =============================================================================

/** Number of registered signers. */
export const SIGNER_COUNT = 4;

/** Distinct valid signatures that execute an operation. */
export const QUORUM_THRESHOLD = 3;

/** Lifetime of an operation, in seconds (3 days). */
export const OPERATION_DEADLINE_SECONDS = 3 * 24 * 60 * 60;

// =============================================================================
// Operation Kinds
// =============================================================================

export type OperationKind =
  | "pause"
  | "unpause"
  | "setBridgeInCaller"
  | "setBridgeInLimits"
  | "updateSigner"
  | "setBridgeInEnabled"
  | "setBridgeOutEnabled"
  | "relinquish";

/**
 * Numeric operation type code per kind. Codes differ between deployed
 * variants, so a table is part of each deployment's configuration.
 * A kind without a code cannot be requested.
 */
export type OperationCodeTable = Readonly<Partial<Record<OperationKind, number>>>;

/**
 * Decoded effect of an operation, matched exhaustively at execution.
 */
export type OperationEffect =
  | { readonly kind: "pause" }
  | { readonly kind: "unpause" }
  | { readonly kind: "setBridgeInCaller"; readonly bridgeInCaller: Address }
  | {
      readonly kind: "setBridgeInLimits";
      readonly maxBridgeInAmount: bigint;
      readonly bridgeInCooldown: number;
    }
  | { readonly kind: "updateSigner"; readonly oldSigner: Address; readonly newSigner: Address }
  | { readonly kind: "setBridgeInEnabled"; readonly enabled: boolean }
  | { readonly kind: "setBridgeOutEnabled"; readonly enabled: boolean }
  | { readonly kind: "relinquish" };

/**
 * Contract-side handlers for every effect the governance layer does not
 * apply itself. `relinquish` is absent on variants without custody.
 */
export interface OperationEffects {
  pause(): void;
  unpause(): void;
  setBridgeInCaller(bridgeInCaller: Address): void;
  setBridgeInLimits(maxBridgeInAmount: bigint, bridgeInCooldown: number): void;
  setBridgeInEnabled(enabled: boolean): void;
  setBridgeOutEnabled(enabled: boolean): void;
  relinquish?(): void;
}

// =============================================================================
// Operation Record
// =============================================================================

/**
 * A stored operation.
 */
export interface Operation {
  /** Fingerprint of (sequence, type, target, value, data, chain tag) */
  readonly operationId: Hex;

  /** Position in the contract's request order (0-based) */
  readonly sequence: bigint;

  /** Numeric type code as requested */
  readonly operationType: number;

  readonly kind: OperationKind;
  readonly target: Address;
  readonly value: bigint;

  /** Opaque ABI-encoded payload ("0x" when unused) */
  readonly data: Hex;

  readonly requestedBy: Address;

  /** Signers whose signature was accepted, in submission order */
  readonly signedBy: readonly Address[];

  readonly executed: boolean;

  /** Unix seconds; signatures are rejected once now > deadline */
  readonly deadline: number;
}

// =============================================================================
// Errors
// =============================================================================

export type GovernanceErrorCode =
  | "NOT_AUTHORIZED"
  | "NOT_A_SIGNER"
  | "INVALID_SIGNER_SET"
  | "INVALID_SIGNER_UPDATE"
  | "ALREADY_EXECUTED"
  | "DUPLICATE_SIGNATURE"
  | "DEADLINE_PASSED"
  | "INVALID_SIGNATURE"
  | "SIGNATURE_MISMATCH"
  | "REPLACED_SIGNER_CANNOT_APPROVE"
  | "UNKNOWN_OPERATION_TYPE"
  | "OPERATION_NOT_FOUND"
  | "INVALID_PAYLOAD"
  | "REENTRANT_CALL"
  | "HALTED";

/**
 * Structured error from the governance layer.
 */
export class GovernanceError extends Error {
  public readonly code: GovernanceErrorCode;

  constructor(code: GovernanceErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GovernanceError";
    this.code = code;
  }
}
