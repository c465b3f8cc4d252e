/**
 * Lock-and-release bridge: a vault holding custody of an external token
 * on the same chain.
 *
 * bridgeOut / lockTokens escrow from the caller (allowance required);
 * bridgeIn / releaseTokens pay out of custody. relinquish sweeps all
 * custody back to the origin token's own address and halts the vault.
 */

import type { Address, Amount, ChainTag, Hex, TransferId } from "@twinledger/types";
import type { Chain, TokenLedger } from "@twinledger/ledger";
import type { Operation } from "@twinledger/governance";
import { LOCK_RELEASE_OPERATION_CODES } from "@twinledger/governance";
import { BridgeCore } from "./bridge-core.js";
import type { BridgeContractConfig, BridgeLedger } from "./types.js";

export interface BridgeVaultConfig extends BridgeContractConfig {
  /**
   * Whether pause also blocks inbound settlement. Default: false, so
   * transfers already committed on the sibling chain can complete
   * during an incident.
   */
  readonly pauseBlocksInbound?: boolean;
}

export class BridgeVault implements BridgeLedger {
  readonly address: Address;

  /** The custodied token */
  readonly token: TokenLedger;

  /** Shared bridge state; exposed for inspection */
  readonly core: BridgeCore;

  private readonly _chain: Chain;

  constructor(chain: Chain, token: TokenLedger, config: BridgeVaultConfig) {
    this._chain = chain;
    this.token = token;
    this.address = chain.deployAddress("vault");

    const vault = this.address;
    this.core = new BridgeCore({
      chain,
      address: vault,
      config,
      defaultCodes: LOCK_RELEASE_OPERATION_CODES,
      pauseBlocksInbound: config.pauseBlocksInbound ?? false,
      policy: {
        balanceOf: (account) => token.balanceOf(account),
        takeOut: (from, amount) => {
          token.transferFrom(vault, from, vault, amount);
        },
        payIn: (recipient, amount) => {
          token.transfer(vault, recipient, amount);
        },
        custody: () => token.balanceOf(vault),
      },
      sweep: {
        destination: token.address,
        custody: () => token.balanceOf(vault),
        transfer: (amount) => {
          token.transfer(vault, token.address, amount);
        },
      },
    });
  }

  // ─── Governance ─────────────────────────────────────────────────────

  requestOperation(caller: Address, operationType: number, target: string, value: bigint, data?: string): Hex {
    return this.core.governance.requestOperation(caller, operationType, target, value, data);
  }

  getOperationHash(operationId: Hex): Hex {
    return this.core.governance.getOperationHash(operationId);
  }

  submitSignature(caller: Address, operationId: Hex, signature: string): Promise<Operation> {
    return this.core.governance.submitSignature(caller, operationId, signature);
  }

  isOperationExpired(operationId: Hex): boolean {
    return this.core.governance.isOperationExpired(operationId);
  }

  getOperation(operationId: Hex): Operation | undefined {
    return this.core.governance.getOperation(operationId);
  }

  isSigner(identity: string): boolean {
    return this.core.isSigner(identity);
  }

  // ─── Value Movement ─────────────────────────────────────────────────

  bridgeOut(
    caller: Address,
    amount: Amount,
    target: string,
    chainTag: ChainTag,
    destinationChainTag?: ChainTag,
  ): void {
    this.core.bridgeOut(caller, amount, target, chainTag, destinationChainTag);
  }

  /** Alias of bridgeOut. */
  lockTokens(
    caller: Address,
    amount: Amount,
    target: string,
    chainTag: ChainTag,
    destinationChainTag?: ChainTag,
  ): void {
    this.bridgeOut(caller, amount, target, chainTag, destinationChainTag);
  }

  bridgeIn(
    caller: Address,
    recipient: string,
    amount: Amount,
    chainTag: ChainTag,
    transferId: TransferId,
    sourceChainTag?: ChainTag,
  ): void {
    this.core.bridgeIn(caller, recipient, amount, chainTag, transferId, sourceChainTag);
  }

  /** Alias of bridgeIn. */
  releaseTokens(
    caller: Address,
    recipient: string,
    amount: Amount,
    chainTag: ChainTag,
    transferId: TransferId,
    sourceChainTag?: ChainTag,
  ): void {
    this.bridgeIn(caller, recipient, amount, chainTag, transferId, sourceChainTag);
  }

  // ─── Views ──────────────────────────────────────────────────────────

  /** Custody currently held. */
  getVaultBalance(): Amount {
    return this.token.balanceOf(this.address);
  }

  getChainId(): ChainTag {
    return this._chain.chainId;
  }

  isProcessed(transferId: TransferId): boolean {
    return this.core.isProcessed(transferId);
  }

  get bridgeInCaller(): Address {
    return this.core.bridgeInCaller;
  }

  get maxBridgeInAmount(): Amount {
    return this.core.maxBridgeInAmount;
  }

  get bridgeInCooldown(): number {
    return this.core.pacer.cooldown;
  }

  get bridgeInEnabled(): boolean {
    return this.core.bridgeInEnabled;
  }

  get bridgeOutEnabled(): boolean {
    return this.core.bridgeOutEnabled;
  }

  get paused(): boolean {
    return this.core.lifecycle.paused;
  }

  get halted(): boolean {
    return this.core.lifecycle.halted;
  }
}
