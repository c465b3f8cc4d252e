/**
 * @twinledger/event-store — Event Catalog.
 *
 * Registry of every event type the ledgers emit, with a payload
 * validator per type. A Chain given a catalog refuses to emit an event
 * that does not validate, so nothing malformed enters its audit trail.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "bridge.out",
 *   description: "Value left this ledger",
 *   source: "bridge",
 *   validate: (p) => typeof p === "object" && p !== null && "amount" in p,
 * });
 *
 * catalog.validate("bridge.out", payload);
 * ```
 */

import type { EventSource } from "@twinledger/types";

export interface EventSchema {
  /** Event type string (e.g., "bridge.out") */
  readonly type: string;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** Returns true if the payload has the shape this event carries. */
  validate(payload: unknown): boolean;
}

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * @throws CatalogError if the type is already registered
   */
  register(schema: EventSchema): void {
    if (this._schemas.has(schema.type)) {
      throw new CatalogError(`Event type "${schema.type}" is already registered`);
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   *
   * @returns false for unregistered types
   */
  validate(eventType: string, payload: unknown): boolean {
    return this._schemas.get(eventType)?.validate(payload) ?? false;
  }

  get size(): number {
    return this._schemas.size;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
