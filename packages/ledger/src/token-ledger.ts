/**
 * @twinledger/ledger — Fungible token ledger.
 *
 * Balances, allowances and total supply for one token on one chain.
 *
 * Invariants:
 * - Sum of all balances === totalSupply
 * - Balances never go negative
 * - Every mutation is a Chain call: it either fully applies or leaves
 *   no trace (state or event)
 *
 * Subclasses hook in through `beforeTransfer` (pause gating) and get
 * privileged supply changes through `mintTo` / `burnFrom`.
 */

import { getAddress, isAddress, maxUint256 } from "viem";
import type { Address, Amount } from "@twinledger/types";
import { ZERO_ADDRESS } from "@twinledger/types";
import { BRIDGE_EVENTS } from "@twinledger/event-store";
import type { TokenApprovalPayload, TokenTransferPayload } from "@twinledger/event-store";
import type { Chain } from "./chain.js";
import { JournaledCell, JournaledMap } from "./journal.js";
import type { ReceiveHook, TokenConfig } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Checksum an address, rejecting malformed input.
 */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid address: ${value}`);
  }
  return getAddress(value);
}

export class TokenLedger {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  protected readonly chain: Chain;

  private readonly _balances: JournaledMap<Address, Amount>;
  private readonly _allowances: JournaledMap<string, Amount>;
  private readonly _totalSupply: JournaledCell<Amount>;
  private readonly _receiveHooks = new Map<Address, ReceiveHook>();

  constructor(chain: Chain, config: TokenConfig) {
    this.chain = chain;
    this.name = config.name;
    this.symbol = config.symbol;
    this.decimals = config.decimals ?? 18;
    this.address = chain.deployAddress(`token:${config.symbol}`);
    this._balances = new JournaledMap(chain);
    this._allowances = new JournaledMap(chain);
    this._totalSupply = new JournaledCell(chain, 0n);
  }

  get streamId(): string {
    return `token:${this.address}`;
  }

  // ─── Views ──────────────────────────────────────────────────────────

  get totalSupply(): Amount {
    return this._totalSupply.value;
  }

  balanceOf(account: string): Amount {
    return this._balances.get(normalizeAddress(account)) ?? 0n;
  }

  allowance(owner: string, spender: string): Amount {
    return this._allowances.get(allowanceKey(normalizeAddress(owner), normalizeAddress(spender))) ?? 0n;
  }

  // ─── Transfers ──────────────────────────────────────────────────────

  transfer(caller: Address, to: string, amount: Amount): boolean {
    return this.chain.transact(caller, () => {
      this._move(normalizeAddress(caller), normalizeAddress(to), amount);
      return true;
    });
  }

  approve(caller: Address, spender: string, amount: Amount): boolean {
    return this.chain.transact(caller, () => {
      assertAmount(amount);
      const owner = normalizeAddress(caller);
      const normalizedSpender = normalizeAddress(spender);
      if (normalizedSpender === ZERO_ADDRESS) {
        throw new LedgerError("INVALID_ADDRESS", "Cannot approve the zero address");
      }
      this._allowances.set(allowanceKey(owner, normalizedSpender), amount);
      this.chain.emit(this.streamId, "token", BRIDGE_EVENTS.APPROVAL, {
        owner,
        spender: normalizedSpender,
        amount: amount.toString(),
      } satisfies TokenApprovalPayload);
      return true;
    });
  }

  /**
   * Move `amount` from `from` to `to` on `from`'s behalf, spending the
   * caller's allowance. An allowance of 2^256 - 1 is never decreased.
   */
  transferFrom(caller: Address, from: string, to: string, amount: Amount): boolean {
    return this.chain.transact(caller, () => {
      assertAmount(amount);
      const spender = normalizeAddress(caller);
      const owner = normalizeAddress(from);
      const key = allowanceKey(owner, spender);
      const allowed = this._allowances.get(key) ?? 0n;
      if (allowed < amount) {
        throw new LedgerError(
          "INSUFFICIENT_ALLOWANCE",
          `Allowance ${allowed} of ${spender} for ${owner} is below ${amount}`,
        );
      }
      if (allowed !== maxUint256) {
        this._allowances.set(key, allowed - amount);
      }
      this._move(owner, normalizeAddress(to), amount);
      return true;
    });
  }

  /**
   * Register (or clear, with `undefined`) the code that runs when
   * `account` is credited by a transfer.
   */
  onReceive(account: string, hook: ReceiveHook | undefined): void {
    const normalized = normalizeAddress(account);
    if (hook === undefined) {
      this._receiveHooks.delete(normalized);
    } else {
      this._receiveHooks.set(normalized, hook);
    }
  }

  // ─── Supply (subclasses only) ───────────────────────────────────────

  protected mintTo(to: Address, amount: Amount): void {
    this.chain.transact(this.address, () => {
      assertAmount(amount);
      const recipient = normalizeAddress(to);
      if (recipient === ZERO_ADDRESS) {
        throw new LedgerError("INVALID_ADDRESS", "Cannot mint to the zero address");
      }
      this.beforeTransfer(ZERO_ADDRESS, recipient, amount);
      this._totalSupply.set(this._totalSupply.value + amount);
      this._credit(recipient, amount);
      this._emitTransfer(ZERO_ADDRESS, recipient, amount);
    });
  }

  protected burnFrom(from: Address, amount: Amount): void {
    this.chain.transact(this.address, () => {
      assertAmount(amount);
      const holder = normalizeAddress(from);
      this.beforeTransfer(holder, ZERO_ADDRESS, amount);
      this._debit(holder, amount);
      this._totalSupply.set(this._totalSupply.value - amount);
      this._emitTransfer(holder, ZERO_ADDRESS, amount);
    });
  }

  /**
   * Runs before every balance change, including mint and burn
   * (ZERO_ADDRESS stands for the missing side). Throw to block it.
   */
  protected beforeTransfer(_from: Address, _to: Address, _amount: Amount): void {}

  // ─── Internal ───────────────────────────────────────────────────────

  private _move(from: Address, to: Address, amount: Amount): void {
    assertAmount(amount);
    if (to === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_ADDRESS", "Cannot transfer to the zero address");
    }
    this.beforeTransfer(from, to, amount);
    this._debit(from, amount);
    this._credit(to, amount);
    this._emitTransfer(from, to, amount);

    const hook = this._receiveHooks.get(to);
    if (hook !== undefined) hook(from, amount);
  }

  private _debit(account: Address, amount: Amount): void {
    const balance = this._balances.get(account) ?? 0n;
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Balance ${balance} of ${account} is below ${amount}`,
      );
    }
    this._balances.set(account, balance - amount);
  }

  private _credit(account: Address, amount: Amount): void {
    this._balances.set(account, (this._balances.get(account) ?? 0n) + amount);
  }

  private _emitTransfer(from: Address, to: Address, amount: Amount): void {
    this.chain.emit(this.streamId, "token", BRIDGE_EVENTS.TRANSFER, {
      from,
      to,
      amount: amount.toString(),
    } satisfies TokenTransferPayload);
  }
}

/**
 * A token whose whole supply is minted to one holder at deployment.
 */
export class FixedSupplyToken extends TokenLedger {
  constructor(chain: Chain, config: TokenConfig, holder: Address, supply: Amount) {
    super(chain, config);
    chain.transact(holder, () => this.mintTo(holder, supply));
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}

function assertAmount(amount: Amount): void {
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount}`);
  }
}
