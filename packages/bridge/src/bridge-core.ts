/**
 * Bridge Accounting Core
 *
 * State and checks shared by both value policies: chain binding,
 * governance, bridge caller, per-transfer cap, inbound pacing, replay
 * protection, enable flags, lifecycle and the contract's reentrancy
 * guard. The variant supplies only how value leaves and arrives
 * (ValuePolicy) and, if it holds custody, how custody is swept.
 *
 * Ordering: on inbound settlement the replay registry and pacing clock
 * are updated before any value moves.
 */

import type { Address, Amount, ChainTag, TransferId } from "@twinledger/types";
import { DEFAULT_CHAIN_TAG, ZERO_ADDRESS, isTransferId } from "@twinledger/types";
import type { Chain } from "@twinledger/ledger";
import { JournaledCell, LedgerError, ReentrancyGuard, normalizeAddress } from "@twinledger/ledger";
import { BRIDGE_EVENTS } from "@twinledger/event-store";
import type {
  BridgeCallerUpdatedPayload,
  BridgeLimitsUpdatedPayload,
  BridgeToggledPayload,
  BridgedInPayload,
  BridgedOutPayload,
  LifecycleChangedPayload,
  VaultSweptPayload,
} from "@twinledger/event-store";
import type { OperationCodeTable, OperationEffects } from "@twinledger/governance";
import { OperationBook, SignerRegistry } from "@twinledger/governance";
import { Lifecycle } from "./lifecycle.js";
import { InboundPacer } from "./pacing.js";
import { ReplayRegistry } from "./replay-registry.js";
import type { BridgeContractConfig } from "./types.js";
import {
  BridgeError,
  DEFAULT_BRIDGE_IN_COOLDOWN,
  DEFAULT_MAX_BRIDGE_IN_AMOUNT,
} from "./types.js";

/**
 * How value leaves and arrives for one variant.
 */
export interface ValuePolicy {
  /** What `account` holds and could bridge out */
  balanceOf(account: Address): Amount;

  /** Burn or escrow */
  takeOut(from: Address, amount: Amount): void;

  /** Mint or release */
  payIn(recipient: Address, amount: Amount): void;

  /** Value available for inbound settlement, or undefined if minted */
  custody(): Amount | undefined;
}

/**
 * Custody sweep for variants that can relinquish.
 */
export interface SweepPolicy {
  readonly destination: Address;
  custody(): Amount;
  transfer(amount: Amount): void;
}

export interface BridgeCoreOptions {
  readonly chain: Chain;
  readonly address: Address;
  readonly config: BridgeContractConfig;
  readonly defaultCodes: OperationCodeTable;
  readonly pauseBlocksInbound: boolean;
  readonly policy: ValuePolicy;
  readonly sweep?: SweepPolicy;
}

export class BridgeCore {
  readonly chain: Chain;
  readonly address: Address;
  readonly pauseBlocksInbound: boolean;

  readonly registry: SignerRegistry;
  readonly governance: OperationBook;
  readonly lifecycle: Lifecycle;
  readonly replay: ReplayRegistry;
  readonly pacer: InboundPacer;
  readonly guard = new ReentrancyGuard();

  private readonly _policy: ValuePolicy;
  private readonly _sweep: SweepPolicy | undefined;
  private readonly _bridgeInCaller: JournaledCell<Address>;
  private readonly _maxBridgeInAmount: JournaledCell<Amount>;
  private readonly _bridgeInEnabled: JournaledCell<boolean>;
  private readonly _bridgeOutEnabled: JournaledCell<boolean>;

  constructor(options: BridgeCoreOptions) {
    const { chain, config } = options;
    this.chain = chain;
    this.address = options.address;
    this.pauseBlocksInbound = options.pauseBlocksInbound;
    this._policy = options.policy;
    this._sweep = options.sweep;

    const maxBridgeInAmount = config.maxBridgeInAmount ?? DEFAULT_MAX_BRIDGE_IN_AMOUNT;
    if (maxBridgeInAmount < 0n) {
      throw new BridgeError("INVALID_CONFIGURATION", "Per-transfer cap cannot be negative");
    }

    this.lifecycle = new Lifecycle(chain);
    this.replay = new ReplayRegistry(chain, config.replayCapacity);
    this.pacer = new InboundPacer(chain, config.bridgeInCooldown ?? DEFAULT_BRIDGE_IN_COOLDOWN);
    this._bridgeInCaller = new JournaledCell(chain, this.identity(config.bridgeInCaller ?? ZERO_ADDRESS));
    this._maxBridgeInAmount = new JournaledCell(chain, maxBridgeInAmount);
    this._bridgeInEnabled = new JournaledCell(chain, true);
    this._bridgeOutEnabled = new JournaledCell(chain, true);

    this.registry = new SignerRegistry(chain, config.signers, config.administrator);
    this.governance = new OperationBook({
      chain,
      contract: this.address,
      registry: this.registry,
      codes: config.codes ?? options.defaultCodes,
      effects: this._effects(),
      guard: this.guard,
      isHalted: () => this.lifecycle.halted,
    });
  }

  get streamId(): string {
    return `bridge:${this.address}`;
  }

  // ─── Views ──────────────────────────────────────────────────────────

  get bridgeInCaller(): Address {
    return this._bridgeInCaller.value;
  }

  get maxBridgeInAmount(): Amount {
    return this._maxBridgeInAmount.value;
  }

  get bridgeInEnabled(): boolean {
    return this._bridgeInEnabled.value;
  }

  get bridgeOutEnabled(): boolean {
    return this._bridgeOutEnabled.value;
  }

  isProcessed(transferId: string): boolean {
    return isTransferId(transferId) && this.replay.has(normalizeTransferId(transferId));
  }

  isSigner(identity: string): boolean {
    try {
      return this.registry.isSigner(normalizeAddress(identity));
    } catch (err) {
      if (err instanceof LedgerError) return false;
      throw err;
    }
  }

  // ─── Bridge Out ─────────────────────────────────────────────────────

  bridgeOut(
    caller: Address,
    amount: Amount,
    target: string,
    chainTag: ChainTag,
    destinationChainTag: ChainTag = DEFAULT_CHAIN_TAG,
  ): void {
    this._guarded(() =>
      this.chain.transact(caller, () => {
        const from = this.identity(caller);
        this.lifecycle.assertNotHalted();
        this.lifecycle.assertNotPaused();
        if (!this._bridgeOutEnabled.value) {
          throw new BridgeError("BRIDGE_OUT_DISABLED", "Bridge-out is disabled");
        }
        this._assertOwnChain(chainTag);
        if (destinationChainTag !== DEFAULT_CHAIN_TAG && destinationChainTag === this.chain.chainId) {
          throw new BridgeError("SAME_CHAIN_DESTINATION", "Destination chain must differ from source chain");
        }
        const to = this._nonZero(target);
        this._assertAmount(amount);
        const balance = this._policy.balanceOf(from);
        if (balance < amount) {
          throw new BridgeError("INSUFFICIENT_BALANCE", `Balance ${balance} is below ${amount}`);
        }

        this._policy.takeOut(from, amount);

        this.chain.emit(this.streamId, "bridge", BRIDGE_EVENTS.BRIDGED_OUT, {
          from,
          amount: amount.toString(),
          target: to,
          chainTag: chainTag.toString(),
          destinationChainTag: destinationChainTag.toString(),
          timestamp: this.chain.now(),
        } satisfies BridgedOutPayload);
      }),
    );
  }

  // ─── Bridge In ──────────────────────────────────────────────────────

  bridgeIn(
    caller: Address,
    recipient: string,
    amount: Amount,
    chainTag: ChainTag,
    transferId: string,
    sourceChainTag: ChainTag = DEFAULT_CHAIN_TAG,
  ): void {
    this._guarded(() =>
      this.chain.transact(caller, () => {
        const sender = this.identity(caller);
        if (this._bridgeInCaller.value === ZERO_ADDRESS || sender !== this._bridgeInCaller.value) {
          throw new BridgeError("NOT_BRIDGE_CALLER", "Not authorized to bridge in");
        }
        this.lifecycle.assertNotHalted();
        if (this.pauseBlocksInbound) this.lifecycle.assertNotPaused();
        if (!this._bridgeInEnabled.value) {
          throw new BridgeError("BRIDGE_IN_DISABLED", "Bridge-in is disabled");
        }
        this._assertOwnChain(chainTag);
        if (sourceChainTag !== DEFAULT_CHAIN_TAG && sourceChainTag === this.chain.chainId) {
          throw new BridgeError("INVALID_CHAIN_TAG", "Source chain must differ from this chain");
        }
        const to = this._nonZero(recipient);
        this._assertAmount(amount);

        const now = this.chain.now();
        this.pacer.assertReady(now);

        if (!isTransferId(transferId)) {
          throw new BridgeError("INVALID_TRANSFER_ID", `Transfer id must be 32 bytes of hex: ${transferId}`);
        }
        const id = normalizeTransferId(transferId);
        if (this.replay.has(id)) {
          throw new BridgeError("ALREADY_PROCESSED", `Transfer already processed: ${id}`);
        }

        const custody = this._policy.custody();
        if (custody !== undefined && custody < amount) {
          throw new BridgeError("INSUFFICIENT_CUSTODY", `Custody ${custody} is below ${amount}`);
        }

        this.replay.insert(id);
        this.pacer.record(now);
        this._policy.payIn(to, amount);

        this.chain.emit(this.streamId, "bridge", BRIDGE_EVENTS.BRIDGED_IN, {
          recipient: to,
          amount: amount.toString(),
          chainTag: chainTag.toString(),
          transferId: id,
          sourceChainTag: sourceChainTag.toString(),
          timestamp: now,
        } satisfies BridgedInPayload);
      }),
    );
  }

  // ─── Governance Effects ─────────────────────────────────────────────

  private _effects(): OperationEffects {
    const effects: OperationEffects = {
      pause: () => {
        this.lifecycle.pause();
        this._emitLifecycle(BRIDGE_EVENTS.PAUSED);
      },
      unpause: () => {
        this.lifecycle.unpause();
        this._emitLifecycle(BRIDGE_EVENTS.UNPAUSED);
      },
      setBridgeInCaller: (bridgeInCaller) => {
        this._bridgeInCaller.set(bridgeInCaller);
        this.chain.emit(this.streamId, "bridge", BRIDGE_EVENTS.BRIDGE_CALLER_UPDATED, {
          bridgeInCaller,
          timestamp: this.chain.now(),
        } satisfies BridgeCallerUpdatedPayload);
      },
      setBridgeInLimits: (maxBridgeInAmount, bridgeInCooldown) => {
        this._maxBridgeInAmount.set(maxBridgeInAmount);
        this.pacer.setCooldown(bridgeInCooldown);
        this.chain.emit(this.streamId, "bridge", BRIDGE_EVENTS.BRIDGE_LIMITS_UPDATED, {
          maxBridgeInAmount: maxBridgeInAmount.toString(),
          bridgeInCooldown,
          timestamp: this.chain.now(),
        } satisfies BridgeLimitsUpdatedPayload);
      },
      setBridgeInEnabled: (enabled) => {
        this._bridgeInEnabled.set(enabled);
        this._emitToggle(BRIDGE_EVENTS.BRIDGE_IN_TOGGLED, enabled);
      },
      setBridgeOutEnabled: (enabled) => {
        this._bridgeOutEnabled.set(enabled);
        this._emitToggle(BRIDGE_EVENTS.BRIDGE_OUT_TOGGLED, enabled);
      },
    };

    const sweep = this._sweep;
    if (sweep === undefined) return effects;
    return { ...effects, relinquish: () => this._relinquish(sweep) };
  }

  /**
   * Sweep all custody back to the origin ledger and halt for good.
   * Allowed while paused.
   */
  private _relinquish(sweep: SweepPolicy): void {
    const amount = sweep.custody();
    if (amount === 0n) {
      throw new BridgeError("NOTHING_TO_RELINQUISH", "No custodied balance to relinquish");
    }

    this.lifecycle.halt();
    sweep.transfer(amount);

    this.chain.emit(this.streamId, "bridge", BRIDGE_EVENTS.VAULT_SWEPT, {
      amount: amount.toString(),
      destination: sweep.destination,
      timestamp: this.chain.now(),
    } satisfies VaultSweptPayload);
    this._emitLifecycle(BRIDGE_EVENTS.HALTED);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Normalize an identity, reporting malformed input as a BridgeError.
   */
  identity(value: string): Address {
    try {
      return normalizeAddress(value);
    } catch (err) {
      if (err instanceof LedgerError) {
        throw new BridgeError("INVALID_ADDRESS", err.message);
      }
      throw err;
    }
  }

  private _nonZero(value: string): Address {
    const address = this.identity(value);
    if (address === ZERO_ADDRESS) {
      throw new BridgeError("INVALID_ADDRESS", "Address cannot be zero");
    }
    return address;
  }

  private _assertOwnChain(chainTag: ChainTag): void {
    if (chainTag !== this.chain.chainId) {
      throw new BridgeError("INVALID_CHAIN_TAG", "Invalid chain ID");
    }
  }

  private _assertAmount(amount: Amount): void {
    if (amount <= 0n) {
      throw new BridgeError("ZERO_AMOUNT", "Amount must be greater than 0");
    }
    if (amount > this._maxBridgeInAmount.value) {
      throw new BridgeError("AMOUNT_EXCEEDS_LIMIT", "Amount exceeds bridge-in limit");
    }
  }

  private _guarded(fn: () => void): void {
    this.guard.run(fn, () => {
      throw new BridgeError("REENTRANT_CALL", "Reentrant call");
    });
  }

  private _emitLifecycle(type: string): void {
    this.chain.emit(this.streamId, "bridge", type, {
      state: this.lifecycle.state,
      timestamp: this.chain.now(),
    } satisfies LifecycleChangedPayload);
  }

  private _emitToggle(type: string, enabled: boolean): void {
    this.chain.emit(this.streamId, "bridge", type, {
      enabled,
      timestamp: this.chain.now(),
    } satisfies BridgeToggledPayload);
  }
}

/**
 * Transfer ids compare case-insensitively.
 */
export function normalizeTransferId(transferId: TransferId): TransferId {
  return `0x${transferId.slice(2).toLowerCase()}`;
}
