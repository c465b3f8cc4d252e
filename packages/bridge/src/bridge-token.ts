/**
 * Burn-and-mint bridge: the ledger is the token itself.
 *
 * bridgeOut burns from the caller; bridgeIn mints to the recipient.
 * While paused, every balance change is blocked, including the mint
 * of an inbound settlement.
 */

import type { Address, Amount, ChainTag, Hex, TransferId } from "@twinledger/types";
import type { Chain, TokenConfig } from "@twinledger/ledger";
import { TokenLedger } from "@twinledger/ledger";
import type { Operation } from "@twinledger/governance";
import { BURN_MINT_OPERATION_CODES } from "@twinledger/governance";
import { BridgeCore } from "./bridge-core.js";
import type { BridgeContractConfig, BridgeLedger } from "./types.js";
import { BridgeError } from "./types.js";

export interface BridgeTokenConfig extends BridgeContractConfig, TokenConfig {}

export class BridgeToken extends TokenLedger implements BridgeLedger {
  /** Shared bridge state; exposed for inspection */
  readonly core: BridgeCore;

  constructor(chain: Chain, config: BridgeTokenConfig) {
    super(chain, config);
    this.core = new BridgeCore({
      chain,
      address: this.address,
      config,
      defaultCodes: BURN_MINT_OPERATION_CODES,
      pauseBlocksInbound: true,
      policy: {
        balanceOf: (account) => this.balanceOf(account),
        takeOut: (from, amount) => this.burnFrom(from, amount),
        payIn: (recipient, amount) => this.mintTo(recipient, amount),
        custody: () => undefined,
      },
    });
  }

  protected override beforeTransfer(): void {
    if (this.core.lifecycle.paused) {
      throw new BridgeError("PAUSED", "Token transfers are paused");
    }
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

  // ─── Views ──────────────────────────────────────────────────────────

  /** Circulating supply on this chain. */
  getVaultBalance(): Amount {
    return this.totalSupply;
  }

  getChainId(): ChainTag {
    return this.chain.chainId;
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
