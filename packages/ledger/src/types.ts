/**
 * @twinledger/ledger — Shared types.
 */

import type { ChainTag } from "@twinledger/types";
import type { EventCatalog, EventStore } from "@twinledger/event-store";

// ─── Host Runtime ────────────────────────────────────────────────────────

/**
 * Returns the current time in unix seconds.
 */
export type Clock = () => number;

export interface ChainConfig {
  /** Chain tag every contract deployed on this chain is bound to */
  readonly chainId: ChainTag;

  /** Defaults to the wall clock */
  readonly clock?: Clock;

  /** Audit trail; defaults to a fresh InMemoryEventStore */
  readonly store?: EventStore;

  /** When set, every emitted event must validate against it */
  readonly catalog?: EventCatalog;
}

// ─── Token ───────────────────────────────────────────────────────────────

export interface TokenConfig {
  readonly name: string;
  readonly symbol: string;

  /** Default: 18 */
  readonly decimals?: number;
}

/**
 * Called after an account is credited by a transfer. Runs inside the
 * transferring call, so it may call back into any contract.
 */
export type ReceiveHook = (from: `0x${string}`, amount: bigint) => void;

// ─── Errors ──────────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "NO_TRANSACTION"
  | "INVALID_EVENT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
