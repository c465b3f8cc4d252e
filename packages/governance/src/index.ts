/**
 * @twinledger/governance — 3-of-4 multi-signature operation authorization.
 *
 * Provides:
 * - SignerRegistry (4 signers + administrator)
 * - Operation code tables per deployed variant
 * - Chain-tagged operation fingerprints and EIP-191 signature recovery
 * - OperationBook: request → sign → execute-on-quorum state machine
 *
 * @packageDocumentation
 */

// Types
export type {
  OperationKind,
  OperationCodeTable,
  OperationEffect,
  OperationEffects,
  Operation,
  GovernanceErrorCode,
} from "./types.js";
export {
  GovernanceError,
  SIGNER_COUNT,
  QUORUM_THRESHOLD,
  OPERATION_DEADLINE_SECONDS,
} from "./types.js";

// Registry
export { SignerRegistry } from "./signer-registry.js";

// Operations
export {
  BURN_MINT_OPERATION_CODES,
  LOCK_RELEASE_OPERATION_CODES,
  resolveKind,
  codeOf,
  assertCodeTable,
  decodeEffect,
  encodeLimitsPayload,
  addressFromValue,
  valueFromAddress,
} from "./operations.js";

// Signing
export type { OperationFields } from "./signing.js";
export {
  computeOperationId,
  computeOperationHash,
  recoverSigner,
  signOperationHash,
} from "./signing.js";

// State machine
export type { OperationBookConfig } from "./operation-book.js";
export { OperationBook } from "./operation-book.js";
