/**
 * Operation Authorization State Machine
 *
 * Requested → (accumulating signatures) → Executed
 * Requested → Expired (deadline passed below quorum; inert forever)
 *
 * One OperationBook per deployed contract. Every state change is a
 * Chain call, so a rejected request or signature leaves neither state
 * nor events behind.
 *
 * Signature submission is async (signature recovery is), but the state
 * transition is not: all checks run again, synchronously, inside the
 * call that records the signature and, on quorum, executes.
 *
 * Operations are never deleted. Executed and expired records stay
 * queryable.
 */

import { maxUint256 } from "viem";
import type { Address, Hex } from "@twinledger/types";
import { isHex, ZERO_ADDRESS } from "@twinledger/types";
import type { Chain, ReentrancyGuard } from "@twinledger/ledger";
import { JournaledCell, JournaledMap } from "@twinledger/ledger";
import { BRIDGE_EVENTS } from "@twinledger/event-store";
import type {
  OperationExecutedPayload,
  OperationRequestedPayload,
  SignatureSubmittedPayload,
  SignerReplacedPayload,
} from "@twinledger/event-store";
import type { SignerRegistry } from "./signer-registry.js";
import { toIdentity } from "./signer-registry.js";
import { assertCodeTable, decodeEffect, resolveKind } from "./operations.js";
import { computeOperationHash, computeOperationId, recoverSigner } from "./signing.js";
import type {
  Operation,
  OperationCodeTable,
  OperationEffect,
  OperationEffects,
} from "./types.js";
import { GovernanceError, OPERATION_DEADLINE_SECONDS, QUORUM_THRESHOLD } from "./types.js";

export interface OperationBookConfig {
  readonly chain: Chain;

  /** Address of the contract this book governs (stream id, actor) */
  readonly contract: Address;

  readonly registry: SignerRegistry;
  readonly codes: OperationCodeTable;
  readonly effects: OperationEffects;

  /** The contract's guard; execution runs under it */
  readonly guard: ReentrancyGuard;

  /** Whether the contract has reached its terminal state */
  readonly isHalted: () => boolean;
}

export class OperationBook {
  private readonly _chain: Chain;
  private readonly _contract: Address;
  private readonly _registry: SignerRegistry;
  private readonly _codes: OperationCodeTable;
  private readonly _effects: OperationEffects;
  private readonly _guard: ReentrancyGuard;
  private readonly _isHalted: () => boolean;

  private readonly _operations: JournaledMap<Hex, Operation>;
  private readonly _nextSequence: JournaledCell<bigint>;

  constructor(config: OperationBookConfig) {
    assertCodeTable(config.codes);
    this._chain = config.chain;
    this._contract = config.contract;
    this._registry = config.registry;
    this._codes = config.codes;
    this._effects = config.effects;
    this._guard = config.guard;
    this._isHalted = config.isHalted;
    this._operations = new JournaledMap(config.chain);
    this._nextSequence = new JournaledCell(config.chain, 0n);
  }

  get streamId(): string {
    return `governance:${this._contract}`;
  }

  /** Number of operations ever requested. */
  get operationCount(): bigint {
    return this._nextSequence.value;
  }

  // ─── Request ────────────────────────────────────────────────────────

  /**
   * Record a new operation and return its identifier.
   *
   * @throws GovernanceError
   */
  requestOperation(
    caller: Address,
    operationType: number,
    target: string,
    value: bigint,
    data: string = "0x",
  ): Hex {
    this._assertNotHalted();
    const requester = toIdentity(caller, "NOT_AUTHORIZED");
    if (!this._registry.isSignerOrAdministrator(requester)) {
      throw new GovernanceError("NOT_AUTHORIZED", `Not authorized to request operations: ${requester}`);
    }

    const kind = resolveKind(this._codes, operationType);
    if (kind === undefined || (kind === "relinquish" && this._effects.relinquish === undefined)) {
      throw new GovernanceError("UNKNOWN_OPERATION_TYPE", `Unknown operation type: ${operationType}`);
    }

    const normalizedTarget = toIdentity(target, "INVALID_PAYLOAD");
    if (value < 0n || value > maxUint256) {
      throw new GovernanceError("INVALID_PAYLOAD", `Value out of uint256 range: ${value}`);
    }
    if (!isHex(data)) {
      throw new GovernanceError("INVALID_PAYLOAD", "Payload must be 0x-prefixed hex");
    }
    const payload = data;

    const effect = decodeEffect(kind, normalizedTarget, value, payload);
    if (effect.kind === "updateSigner") {
      this._validateSignerUpdate(requester, effect.oldSigner, effect.newSigner);
    }

    return this._chain.transact(requester, () => {
      const sequence = this._nextSequence.value;
      const now = this._chain.now();
      const fields = {
        sequence,
        operationType,
        target: normalizedTarget,
        value,
        data: payload,
        chainTag: this._chain.chainId,
      };
      const operationId = computeOperationId(fields);
      const operation: Operation = {
        operationId,
        sequence,
        operationType,
        kind,
        target: normalizedTarget,
        value,
        data: payload,
        requestedBy: requester,
        signedBy: [],
        executed: false,
        deadline: now + OPERATION_DEADLINE_SECONDS,
      };

      this._nextSequence.set(sequence + 1n);
      this._operations.set(operationId, operation);
      this._chain.emit(this.streamId, "governance", BRIDGE_EVENTS.OPERATION_REQUESTED, {
        operationId,
        sequence: sequence.toString(),
        operationType,
        kind,
        target: normalizedTarget,
        value: value.toString(),
        data: payload,
        requestedBy: requester,
        deadline: operation.deadline,
        timestamp: now,
      } satisfies OperationRequestedPayload);

      return operationId;
    });
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getOperation(operationId: Hex): Operation | undefined {
    return this._operations.get(operationId);
  }

  /**
   * The digest signers must sign for `operationId`.
   */
  getOperationHash(operationId: Hex): Hex {
    const op = this._require(operationId);
    return computeOperationHash(op.operationId, {
      sequence: op.sequence,
      operationType: op.operationType,
      target: op.target,
      value: op.value,
      data: op.data,
      chainTag: this._chain.chainId,
    });
  }

  isOperationExpired(operationId: Hex): boolean {
    return this._chain.now() > this._require(operationId).deadline;
  }

  // ─── Signatures ─────────────────────────────────────────────────────

  /**
   * Add the caller's own signature. The third distinct signature
   * executes the operation within the same call.
   *
   * @returns The operation after the signature was recorded
   * @throws GovernanceError
   */
  async submitSignature(caller: Address, operationId: Hex, signature: string): Promise<Operation> {
    const signer = toIdentity(caller, "NOT_A_SIGNER");
    this._checkSubmission(signer, operationId);

    const recovered = await recoverSigner(this.getOperationHash(operationId), signature);

    return this._chain.transact(signer, () => {
      const op = this._checkSubmission(signer, operationId);
      if (recovered !== signer) {
        throw new GovernanceError(
          "SIGNATURE_MISMATCH",
          `Signature recovers to ${recovered}, not to the caller ${signer}`,
        );
      }
      if (op.kind === "updateSigner") {
        if (!this._registry.isSignerOrAdministrator(recovered)) {
          throw new GovernanceError("NOT_A_SIGNER", `Not a signer or administrator: ${recovered}`);
        }
        if (recovered === op.target) {
          throw new GovernanceError(
            "REPLACED_SIGNER_CANNOT_APPROVE",
            "Signer being replaced cannot approve",
          );
        }
      }

      const signed: Operation = { ...op, signedBy: [...op.signedBy, signer] };
      this._operations.set(operationId, signed);
      this._chain.emit(this.streamId, "governance", BRIDGE_EVENTS.SIGNATURE_SUBMITTED, {
        operationId,
        signer,
        signature,
        signatureCount: signed.signedBy.length,
        timestamp: this._chain.now(),
      } satisfies SignatureSubmittedPayload);

      if (signed.signedBy.length === QUORUM_THRESHOLD) {
        return this._execute(signed);
      }
      return signed;
    });
  }

  // ─── Execution ──────────────────────────────────────────────────────

  private _execute(op: Operation): Operation {
    const executed: Operation = { ...op, executed: true };
    this._operations.set(op.operationId, executed);

    const effect = decodeEffect(op.kind, op.target, op.value, op.data);
    this._guard.run(
      () => this._chain.transact(this._contract, () => this._apply(effect)),
      () => {
        throw new GovernanceError("REENTRANT_CALL", "Operation executed during a guarded call");
      },
    );

    this._chain.emit(this.streamId, "governance", BRIDGE_EVENTS.OPERATION_EXECUTED, {
      operationId: op.operationId,
      operationType: op.operationType,
      kind: op.kind,
      timestamp: this._chain.now(),
    } satisfies OperationExecutedPayload);

    return executed;
  }

  private _apply(effect: OperationEffect): void {
    switch (effect.kind) {
      case "pause":
        this._effects.pause();
        return;
      case "unpause":
        this._effects.unpause();
        return;
      case "setBridgeInCaller":
        this._effects.setBridgeInCaller(effect.bridgeInCaller);
        return;
      case "setBridgeInLimits":
        this._effects.setBridgeInLimits(effect.maxBridgeInAmount, effect.bridgeInCooldown);
        return;
      case "updateSigner":
        this._registry.replace(effect.oldSigner, effect.newSigner);
        this._chain.emit(this.streamId, "governance", BRIDGE_EVENTS.SIGNER_REPLACED, {
          oldSigner: effect.oldSigner,
          newSigner: effect.newSigner,
          timestamp: this._chain.now(),
        } satisfies SignerReplacedPayload);
        return;
      case "setBridgeInEnabled":
        this._effects.setBridgeInEnabled(effect.enabled);
        return;
      case "setBridgeOutEnabled":
        this._effects.setBridgeOutEnabled(effect.enabled);
        return;
      case "relinquish":
        if (this._effects.relinquish === undefined) {
          throw new GovernanceError("UNKNOWN_OPERATION_TYPE", "Contract cannot relinquish");
        }
        this._effects.relinquish();
        return;
      default: {
        const unreachable: never = effect;
        throw new GovernanceError(
          "UNKNOWN_OPERATION_TYPE",
          `Unknown operation effect: ${JSON.stringify(unreachable)}`,
        );
      }
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _require(operationId: Hex): Operation {
    const op = this._operations.get(operationId);
    if (op === undefined) {
      throw new GovernanceError("OPERATION_NOT_FOUND", `Operation not found: ${operationId}`);
    }
    return op;
  }

  private _assertNotHalted(): void {
    if (this._isHalted()) {
      throw new GovernanceError("HALTED", "Contract is halted");
    }
  }

  private _checkSubmission(signer: Address, operationId: Hex): Operation {
    this._assertNotHalted();
    if (!this._registry.isSigner(signer)) {
      throw new GovernanceError("NOT_A_SIGNER", "Only signers can submit signatures");
    }
    const op = this._require(operationId);
    if (op.executed) {
      throw new GovernanceError("ALREADY_EXECUTED", `Operation already executed: ${operationId}`);
    }
    if (this._chain.now() > op.deadline) {
      throw new GovernanceError("DEADLINE_PASSED", "Operation deadline passed");
    }
    if (op.signedBy.includes(signer)) {
      throw new GovernanceError("DUPLICATE_SIGNATURE", `Signer already signed: ${signer}`);
    }
    return op;
  }

  private _validateSignerUpdate(requester: Address, oldSigner: Address, newSigner: Address): void {
    if (!this._registry.isSigner(oldSigner)) {
      throw new GovernanceError("INVALID_SIGNER_UPDATE", `Old signer is not registered: ${oldSigner}`);
    }
    if (newSigner === ZERO_ADDRESS) {
      throw new GovernanceError("INVALID_SIGNER_UPDATE", "New signer cannot be the zero address");
    }
    if (this._registry.isSigner(newSigner)) {
      throw new GovernanceError("INVALID_SIGNER_UPDATE", `New signer is already registered: ${newSigner}`);
    }
    if (requester === oldSigner) {
      throw new GovernanceError("INVALID_SIGNER_UPDATE", "Cannot request your own removal");
    }
  }
}
