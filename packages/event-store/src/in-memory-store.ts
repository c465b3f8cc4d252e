/**
 * @twinledger/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Each ledger's Chain owns one store and
 * appends to it when a call commits.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch, after every batch is stored
 * - A throwing subscriber never fails the append
 * - No durability guarantees
 */

import type { DomainEvent } from "@twinledger/types";
import type {
  AppendBatch,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  SubscriberErrorHandler,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Default: rethrown on a microtask, outside the appending call */
  readonly onSubscriberError?: SubscriberErrorHandler;
}

function rethrowLater(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  private readonly _onSubscriberError: SubscriberErrorHandler;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._onSubscriberError = options.onSubscriberError ?? rethrowLater;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateBatch(streamId, events);
    const { result, records } = this._store(streamId, events, new Date().toISOString());
    this._dispatch(streamId, records);
    return result;
  }

  appendBatches(batches: readonly AppendBatch[]): readonly AppendResult[] {
    for (const { streamId, events } of batches) {
      this._validateBatch(streamId, events);
    }

    const appendedAt = new Date().toISOString();
    const stored = batches.map(({ streamId, events }) => this._store(streamId, events, appendedAt));
    stored.forEach(({ result, records }) => this._dispatch(result.streamId, records));
    return stored.map(({ result }) => result);
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return limit(stream.filter((e) => e.version >= fromVersion), options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    return limit(
      this._globalLog.filter((e) => e.globalPosition >= fromPosition),
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateBatch(streamId: string, events: readonly DomainEvent[]): void {
    this._validateStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _store(
    streamId: string,
    events: readonly DomainEvent[],
    appendedAt: string,
  ): { result: AppendResult; records: StoredEvent[] } {
    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);
    const fromVersion = stream.length + 1;

    const records = events.map((event) => {
      const base = {
        event,
        streamId,
        version: stream.length + 1,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = record.hash;
      stream.push(record);
      this._globalLog.push(record);
      return record;
    });

    return {
      result: { streamId, fromVersion, toVersion: stream.length, count: records.length },
      records,
    };
  }

  /**
   * Deliver stored events. A throwing subscriber goes to
   * `onSubscriberError`; it never reaches the appender.
   */
  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];
    for (const event of events) {
      for (const handler of handlers) {
        try {
          handler(event);
        } catch (err) {
          this._onSubscriberError(err, event);
        }
      }
    }
  }

}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
