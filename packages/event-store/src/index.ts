/**
 * @twinledger/event-store — Append-only, hash-chained audit trail.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore, one per chain
 * - Hash chain verification
 * - EventCatalog with every governance / bridge / token event type
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  AppendResult,
  AppendBatch,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  SubscriberErrorHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Domain events
export { BRIDGE_EVENTS, createBridgeCatalog, isBridgedOutPayload } from "./bridge-events.js";
export type {
  BridgeEventType,
  OperationRequestedPayload,
  SignatureSubmittedPayload,
  OperationExecutedPayload,
  SignerReplacedPayload,
  BridgedOutPayload,
  BridgedInPayload,
  BridgeCallerUpdatedPayload,
  BridgeLimitsUpdatedPayload,
  BridgeToggledPayload,
  LifecycleChangedPayload,
  VaultSweptPayload,
  TokenTransferPayload,
  TokenApprovalPayload,
} from "./bridge-events.js";
