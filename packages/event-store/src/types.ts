/**
 * @twinledger/event-store — Core types.
 *
 * Defines the interfaces and types for the append-only audit trail.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by hash
 * - Subscriptions enable reactive consumers (loggers, relayers)
 */

import type { DomainEvent } from "@twinledger/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 * - hash / previousHash: tamper-evident chain across the whole log
 */
export interface StoredEvent {
  /** The domain event */
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event content and previousHash */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * Stored event fields that participate in the hash.
 */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

/**
 * Result of an append operation.
 */
export interface AppendResult {
  /** Stream ID the events were appended to */
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  /** Number of events appended */
  readonly count: number;
}

/**
 * Options for reading events from a stream.
 */
export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
}

/**
 * Options for reading events across all streams.
 */
export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
}

export interface AppendBatch {
  readonly streamId: string;
  readonly events: readonly DomainEvent[];
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for event subscriptions.
 */
export type EventHandler = (event: StoredEvent) => void;

/**
 * Receives a subscriber's failure. The event is already stored and the
 * remaining subscribers still run.
 */
export type SubscriberErrorHandler = (error: unknown, event: StoredEvent) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Subscribers see events in global order, after they are stored
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError on an empty batch or invalid stream id
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /**
   * Append to several streams as one unit, in order. Every event is
   * stored before any subscriber sees the first one.
   *
   * @throws EventStoreError before storing anything if any batch is invalid
   */
  appendBatches(batches: readonly AppendBatch[]): readonly AppendResult[];

  /**
   * Read events from a single stream (empty if the stream doesn't exist).
   */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /**
   * Read events across all streams in global order.
   */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /**
   * Subscribe to new events on a specific stream.
   */
  subscribe(streamId: string, handler: EventHandler): Subscription;

  /**
   * Subscribe to all new events across all streams.
   */
  subscribeAll(handler: EventHandler): Subscription;

  /** Current version of a stream, or 0 if it doesn't exist. */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty. */
  globalPosition(): number;

  /** Recompute and check the hash chain over every stored event. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
