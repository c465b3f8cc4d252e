/**
 * @twinledger/ledger — Undo journal.
 *
 * Every piece of contract state lives in a journaled container. Each
 * write records how to restore the previous value, so a failed call can
 * be unwound to exactly the state it started from.
 */

import { LedgerError } from "./types.js";

/**
 * Restores one write.
 */
export type Undo = () => void;

/**
 * Anything that can collect undo steps for the call in progress.
 * Implemented by Chain.
 */
export interface Journal {
  /**
   * @throws LedgerError (NO_TRANSACTION) when no call is in progress
   */
  record(undo: Undo): void;
}

/**
 * Map whose writes are journaled.
 *
 * Reads are free outside a call. Writes must happen inside one.
 */
export class JournaledMap<K, V> {
  private readonly _entries = new Map<K, V>();

  constructor(private readonly _journal: Journal) {}

  get(key: K): V | undefined {
    return this._entries.get(key);
  }

  has(key: K): boolean {
    return this._entries.has(key);
  }

  get size(): number {
    return this._entries.size;
  }

  set(key: K, value: V): void {
    const existed = this._entries.has(key);
    const previous = this._entries.get(key);
    this._journal.record(() => {
      if (existed && previous !== undefined) {
        this._entries.set(key, previous);
      } else {
        this._entries.delete(key);
      }
    });
    this._entries.set(key, value);
  }

  delete(key: K): void {
    if (!this._entries.has(key)) return;
    const previous = this._entries.get(key);
    this._journal.record(() => {
      if (previous !== undefined) this._entries.set(key, previous);
    });
    this._entries.delete(key);
  }

  entries(): IterableIterator<[K, V]> {
    return this._entries.entries();
  }
}

/**
 * Single journaled value.
 */
export class JournaledCell<T> {
  private _value: T;

  constructor(
    private readonly _journal: Journal,
    initial: T,
  ) {
    this._value = initial;
  }

  get value(): T {
    return this._value;
  }

  set(value: T): void {
    const previous = this._value;
    this._journal.record(() => {
      this._value = previous;
    });
    this._value = value;
  }
}

/**
 * Throws the error every container raises for a write outside a call.
 */
export function noTransaction(): never {
  throw new LedgerError("NO_TRANSACTION", "State can only change inside a transaction");
}
