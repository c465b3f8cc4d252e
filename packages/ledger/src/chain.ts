/**
 * @twinledger/ledger — Host chain runtime.
 *
 * A Chain is the execution environment every contract on one network
 * shares: chain id, clock, address allocation, and the all-or-nothing
 * call boundary.
 *
 * Transaction semantics:
 * - `transact` opens a call. A nested `transact` (a contract calling
 *   another contract, or a receive hook calling back in) is a savepoint
 *   inside the outermost call.
 * - Every state write records an undo step. A throwing call runs the
 *   steps it recorded in reverse, drops the events it emitted and
 *   rethrows. An outer call that catches a nested failure keeps its
 *   own writes.
 * - Events are buffered and appended to the store in one batch when the
 *   outermost call returns. A failed call leaves no trace in the log.
 * - With a catalog, an event whose type is unknown or whose payload
 *   fails validation fails the call that emits it.
 */

import { randomUUID } from "node:crypto";
import { encodeAbiParameters, getAddress, keccak256, slice } from "viem";
import type { Address, ChainTag, DomainEvent, EventSource } from "@twinledger/types";
import type { EventCatalog, EventStore } from "@twinledger/event-store";
import { InMemoryEventStore } from "@twinledger/event-store";
import type { Journal, Undo } from "./journal.js";
import { noTransaction } from "./journal.js";
import type { ChainConfig, Clock } from "./types.js";
import { LedgerError } from "./types.js";

interface PendingEvent {
  readonly streamId: string;
  readonly event: DomainEvent;
}

interface CallFrame {
  readonly correlationId: string;
  readonly undo: Undo[];
  readonly pending: PendingEvent[];
  readonly actors: Address[];
}

const wallClock: Clock = () => Math.floor(Date.now() / 1000);

/** Run undo steps above `mark` newest-first and drop them. */
function unwind(undo: Undo[], mark: number): void {
  while (undo.length > mark) {
    const step = undo.pop();
    if (step !== undefined) step();
  }
}

export class Chain implements Journal {
  readonly chainId: ChainTag;
  readonly store: EventStore;

  private readonly _clock: Clock;
  private readonly _catalog: EventCatalog | undefined;
  private _frame: CallFrame | null = null;
  private _nonce = 0;
  private _eventCounter = 0;

  constructor(config: ChainConfig) {
    this.chainId = config.chainId;
    this._clock = config.clock ?? wallClock;
    this.store = config.store ?? new InMemoryEventStore();
    this._catalog = config.catalog;
  }

  /** Current time in unix seconds. */
  now(): number {
    return this._clock();
  }

  get inTransaction(): boolean {
    return this._frame !== null;
  }

  /** Identity of the innermost caller, if a call is in progress. */
  get currentActor(): Address | undefined {
    const actors = this._frame?.actors;
    return actors?.[actors.length - 1];
  }

  /**
   * Allocate a fresh contract address, unique per chain id and deployment.
   */
  deployAddress(label: string): Address {
    this._nonce++;
    const digest = keccak256(
      encodeAbiParameters(
        [{ type: "uint256" }, { type: "uint256" }, { type: "string" }],
        [this.chainId, BigInt(this._nonce), label],
      ),
    );
    return getAddress(slice(digest, 12));
  }

  // ─── Calls ──────────────────────────────────────────────────────────

  /**
   * Run `fn` as one atomic call made by `actor`.
   */
  transact<T>(actor: Address, fn: () => T): T {
    const outer = this._frame;
    if (outer !== null) {
      // Sub-call: a throw unwinds only what the sub-call wrote.
      const undoMark = outer.undo.length;
      const pendingMark = outer.pending.length;
      outer.actors.push(actor);
      try {
        return fn();
      } catch (err) {
        unwind(outer.undo, undoMark);
        outer.pending.length = pendingMark;
        throw err;
      } finally {
        outer.actors.pop();
      }
    }

    const frame: CallFrame = {
      correlationId: randomUUID(),
      undo: [],
      pending: [],
      actors: [actor],
    };
    this._frame = frame;

    let result: T;
    try {
      result = fn();
    } catch (err) {
      this._frame = null;
      unwind(frame.undo, 0);
      throw err;
    }

    this._frame = null;
    if (frame.pending.length > 0) {
      this.store.appendBatches(
        frame.pending.map(({ streamId, event }) => ({ streamId, events: [event] })),
      );
    }
    return result;
  }

  record(undo: Undo): void {
    if (this._frame === null) noTransaction();
    this._frame.undo.push(undo);
  }

  /**
   * Buffer an event for the call in progress.
   */
  emit(
    streamId: string,
    source: EventSource,
    type: string,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    const frame = this._frame;
    if (frame === null) noTransaction();
    if (this._catalog !== undefined && !this._catalog.validate(type, payload)) {
      throw new LedgerError("INVALID_EVENT", `Payload does not match event type "${type}"`);
    }

    this._eventCounter++;
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: `${this.chainId}-${this._eventCounter}`,
        timestamp: new Date(this.now() * 1000).toISOString(),
        actor: frame.actors[frame.actors.length - 1] ?? "",
        correlationId: frame.correlationId,
        source,
      },
      payload,
    };
    frame.pending.push({ streamId, event });
  }
}
