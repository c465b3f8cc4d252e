/**
 * Event Types
 *
 * Every mutating call on a ledger emits one or more DomainEvents.
 * The event log is the only audit trail of the system.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which call)
 * - Events carry every input field of the call that produced them
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Subsystem that emitted an event.
 */
export type EventSource = "governance" | "bridge" | "token";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp (taken from the emitting chain's clock) */
  readonly timestamp: string;

  /** Identity that made the call */
  readonly actor: string;

  /** Groups all events committed by the same call */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "bridge.out", "governance.operation.executed") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload. Amounts and chain tags are decimal strings. */
  readonly payload: Readonly<Record<string, unknown>>;
}
