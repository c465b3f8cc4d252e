/**
 * @twinledger/event-store — Domain Event Definitions.
 *
 * The catalog of every event the governance, bridge and token
 * subsystems emit.
 *
 * Naming convention: `<subsystem>.<entity>.<action>` (or
 * `<subsystem>.<direction>` for transfers).
 *
 * Payload encoding: addresses and hex as-is, amounts / chain tags /
 * operation values as decimal strings, timestamps as unix seconds.
 */

import {
  isAddress,
  isHex,
  isLifecycleState,
  isTransferId,
  isUintString,
} from "@twinledger/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Governance Events
// =============================================================================

export interface OperationRequestedPayload {
  readonly operationId: string;
  readonly sequence: string;
  readonly operationType: number;
  readonly kind: string;
  readonly target: string;
  readonly value: string;
  readonly data: string;
  readonly requestedBy: string;
  readonly deadline: number;
  readonly timestamp: number;
}

export interface SignatureSubmittedPayload {
  readonly operationId: string;
  readonly signer: string;
  readonly signature: string;
  readonly signatureCount: number;
  readonly timestamp: number;
}

export interface OperationExecutedPayload {
  readonly operationId: string;
  readonly operationType: number;
  readonly kind: string;
  readonly timestamp: number;
}

export interface SignerReplacedPayload {
  readonly oldSigner: string;
  readonly newSigner: string;
  readonly timestamp: number;
}

// =============================================================================
// Bridge Events
// =============================================================================

export interface BridgedOutPayload {
  readonly from: string;
  readonly amount: string;
  readonly target: string;
  readonly chainTag: string;
  readonly destinationChainTag: string;
  readonly timestamp: number;
}

export interface BridgedInPayload {
  readonly recipient: string;
  readonly amount: string;
  readonly chainTag: string;
  readonly transferId: string;
  readonly sourceChainTag: string;
  readonly timestamp: number;
}

export interface BridgeCallerUpdatedPayload {
  readonly bridgeInCaller: string;
  readonly timestamp: number;
}

export interface BridgeLimitsUpdatedPayload {
  readonly maxBridgeInAmount: string;
  readonly bridgeInCooldown: number;
  readonly timestamp: number;
}

export interface BridgeToggledPayload {
  readonly enabled: boolean;
  readonly timestamp: number;
}

export interface LifecycleChangedPayload {
  readonly state: string;
  readonly timestamp: number;
}

export interface VaultSweptPayload {
  readonly amount: string;
  readonly destination: string;
  readonly timestamp: number;
}

// =============================================================================
// Token Events
// =============================================================================

export interface TokenTransferPayload {
  readonly from: string;
  readonly to: string;
  readonly amount: string;
}

export interface TokenApprovalPayload {
  readonly owner: string;
  readonly spender: string;
  readonly amount: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const BRIDGE_EVENTS = {
  // Governance
  OPERATION_REQUESTED: "governance.operation.requested",
  SIGNATURE_SUBMITTED: "governance.signature.submitted",
  OPERATION_EXECUTED: "governance.operation.executed",
  SIGNER_REPLACED: "governance.signer.replaced",

  // Bridge
  BRIDGED_OUT: "bridge.out",
  BRIDGED_IN: "bridge.in",
  BRIDGE_CALLER_UPDATED: "bridge.caller.updated",
  BRIDGE_LIMITS_UPDATED: "bridge.limits.updated",
  BRIDGE_IN_TOGGLED: "bridge.in.toggled",
  BRIDGE_OUT_TOGGLED: "bridge.out.toggled",
  PAUSED: "bridge.lifecycle.paused",
  UNPAUSED: "bridge.lifecycle.unpaused",
  HALTED: "bridge.lifecycle.halted",
  VAULT_SWEPT: "bridge.vault.swept",

  // Token
  TRANSFER: "token.transfer",
  APPROVAL: "token.approval",
} as const;

export type BridgeEventType = (typeof BRIDGE_EVENTS)[keyof typeof BRIDGE_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isSeconds(v: unknown): boolean {
  return typeof v === "number" && Number.isInteger(v) && v >= 0;
}

const GOVERNANCE_SCHEMAS: readonly EventSchema[] = [
  {
    type: BRIDGE_EVENTS.OPERATION_REQUESTED,
    description: "An administrative operation was requested and fingerprinted",
    source: "governance",
    validate: (p) =>
      isObject(p) &&
      isTransferId(p.operationId) &&
      isUintString(p.sequence) &&
      typeof p.operationType === "number" &&
      typeof p.kind === "string" &&
      isAddress(p.target) &&
      isUintString(p.value) &&
      isHex(p.data) &&
      isAddress(p.requestedBy) &&
      isSeconds(p.deadline) &&
      isSeconds(p.timestamp),
  },
  {
    type: BRIDGE_EVENTS.SIGNATURE_SUBMITTED,
    description: "A signer submitted a valid signature for an operation",
    source: "governance",
    validate: (p) =>
      isObject(p) &&
      isTransferId(p.operationId) &&
      isAddress(p.signer) &&
      isHex(p.signature) &&
      typeof p.signatureCount === "number" &&
      isSeconds(p.timestamp),
  },
  {
    type: BRIDGE_EVENTS.OPERATION_EXECUTED,
    description: "An operation reached quorum and its effect was applied",
    source: "governance",
    validate: (p) =>
      isObject(p) &&
      isTransferId(p.operationId) &&
      typeof p.operationType === "number" &&
      typeof p.kind === "string" &&
      isSeconds(p.timestamp),
  },
  {
    type: BRIDGE_EVENTS.SIGNER_REPLACED,
    description: "A signer slot was reassigned",
    source: "governance",
    validate: (p) =>
      isObject(p) && isAddress(p.oldSigner) && isAddress(p.newSigner) && isSeconds(p.timestamp),
  },
];

const isToggle = (p: unknown): boolean =>
  isObject(p) && typeof p.enabled === "boolean" && isSeconds(p.timestamp);

const isLifecycle = (p: unknown): boolean =>
  isObject(p) && isLifecycleState(p.state) && isSeconds(p.timestamp);

/**
 * Shape of a `bridge.out` payload. Relayers narrow with it before
 * settling a transfer elsewhere.
 */
export function isBridgedOutPayload(p: unknown): p is BridgedOutPayload {
  return (
    isObject(p) &&
    isAddress(p.from) &&
    isUintString(p.amount) &&
    isAddress(p.target) &&
    isUintString(p.chainTag) &&
    isUintString(p.destinationChainTag) &&
    isSeconds(p.timestamp)
  );
}

const BRIDGE_SCHEMAS: readonly EventSchema[] = [
  {
    type: BRIDGE_EVENTS.BRIDGED_OUT,
    description: "Value left this ledger towards another chain",
    source: "bridge",
    validate: isBridgedOutPayload,
  },
  {
    type: BRIDGE_EVENTS.BRIDGED_IN,
    description: "An inbound transfer was settled on this ledger",
    source: "bridge",
    validate: (p) =>
      isObject(p) &&
      isAddress(p.recipient) &&
      isUintString(p.amount) &&
      isUintString(p.chainTag) &&
      isTransferId(p.transferId) &&
      isUintString(p.sourceChainTag) &&
      isSeconds(p.timestamp),
  },
  {
    type: BRIDGE_EVENTS.BRIDGE_CALLER_UPDATED,
    description: "The identity allowed to settle inbound transfers changed",
    source: "bridge",
    validate: (p) => isObject(p) && isAddress(p.bridgeInCaller) && isSeconds(p.timestamp),
  },
  {
    type: BRIDGE_EVENTS.BRIDGE_LIMITS_UPDATED,
    description: "Per-transfer cap and inbound cooldown changed",
    source: "bridge",
    validate: (p) =>
      isObject(p) &&
      isUintString(p.maxBridgeInAmount) &&
      isSeconds(p.bridgeInCooldown) &&
      isSeconds(p.timestamp),
  },
  {
    type: BRIDGE_EVENTS.BRIDGE_IN_TOGGLED,
    description: "Inbound settlement was enabled or disabled",
    source: "bridge",
    validate: isToggle,
  },
  {
    type: BRIDGE_EVENTS.BRIDGE_OUT_TOGGLED,
    description: "Outbound transfers were enabled or disabled",
    source: "bridge",
    validate: isToggle,
  },
  {
    type: BRIDGE_EVENTS.PAUSED,
    description: "The contract was paused",
    source: "bridge",
    validate: isLifecycle,
  },
  {
    type: BRIDGE_EVENTS.UNPAUSED,
    description: "The contract was unpaused",
    source: "bridge",
    validate: isLifecycle,
  },
  {
    type: BRIDGE_EVENTS.HALTED,
    description: "The contract entered its terminal state",
    source: "bridge",
    validate: isLifecycle,
  },
  {
    type: BRIDGE_EVENTS.VAULT_SWEPT,
    description: "Custodied balance was returned to the origin ledger",
    source: "bridge",
    validate: (p) =>
      isObject(p) &&
      isUintString(p.amount) &&
      isAddress(p.destination) &&
      isSeconds(p.timestamp),
  },
];

const TOKEN_SCHEMAS: readonly EventSchema[] = [
  {
    type: BRIDGE_EVENTS.TRANSFER,
    description: "Token balance moved (zero address = mint / burn)",
    source: "token",
    validate: (p) =>
      isObject(p) && isAddress(p.from) && isAddress(p.to) && isUintString(p.amount),
  },
  {
    type: BRIDGE_EVENTS.APPROVAL,
    description: "Spending allowance set",
    source: "token",
    validate: (p) =>
      isObject(p) && isAddress(p.owner) && isAddress(p.spender) && isUintString(p.amount),
  },
];

/**
 * Create an EventCatalog pre-populated with every event type.
 */
export function createBridgeCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of [...GOVERNANCE_SCHEMAS, ...BRIDGE_SCHEMAS, ...TOKEN_SCHEMAS]) {
    catalog.register(schema);
  }
  return catalog;
}
