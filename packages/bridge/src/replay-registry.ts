/**
 * Replay-Protection Registry
 *
 * Remembers the last `capacity` settled transfer ids. Slots form a ring:
 * the write cursor only grows, and each insert first evicts whatever id
 * sits in `slots[cursor % capacity]`. An id evicted this way can be
 * settled again; only replays within the most recent `capacity`
 * settlements are caught.
 *
 * O(1) membership, O(1) insert/evict, at most `capacity` live ids.
 */

import type { TransferId } from "@twinledger/types";
import type { Journal } from "@twinledger/ledger";
import { JournaledCell, JournaledMap } from "@twinledger/ledger";
import { BridgeError, REPLAY_CAPACITY } from "./types.js";

export class ReplayRegistry {
  readonly capacity: number;

  private readonly _slots: JournaledMap<number, TransferId>;
  private readonly _processed: JournaledMap<TransferId, number>;
  private readonly _cursor: JournaledCell<number>;

  constructor(journal: Journal, capacity: number = REPLAY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new BridgeError("INVALID_CONFIGURATION", `Replay capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this._slots = new JournaledMap(journal);
    this._processed = new JournaledMap(journal);
    this._cursor = new JournaledCell(journal, 0);
  }

  has(transferId: TransferId): boolean {
    return this._processed.has(transferId);
  }

  /** Ids currently remembered. */
  get size(): number {
    return this._processed.size;
  }

  /** Total ids ever inserted. */
  get cursor(): number {
    return this._cursor.value;
  }

  /**
   * Remember `transferId`, evicting the oldest id when full.
   *
   * @returns The evicted id, if any
   */
  insert(transferId: TransferId): TransferId | undefined {
    if (this._processed.has(transferId)) {
      throw new BridgeError("ALREADY_PROCESSED", `Transfer already processed: ${transferId}`);
    }

    const slot = this._cursor.value % this.capacity;
    const evicted = this._slots.get(slot);
    if (evicted !== undefined) {
      this._processed.delete(evicted);
    }

    this._slots.set(slot, transferId);
    this._processed.set(transferId, slot);
    this._cursor.set(this._cursor.value + 1);
    return evicted;
  }
}
