/**
 * @twinledger/bridge — Cross-chain value ledgers.
 *
 * Two interchangeable policies behind one surface (BridgeLedger):
 * - BridgeToken: burn-and-mint, the ledger is the token
 * - BridgeVault: lock-and-release, custody of an external token
 *
 * Both are governed by a 3-of-4 OperationBook and share caps, global
 * inbound pacing, bounded replay protection and the pause/halt
 * lifecycle.
 *
 * @packageDocumentation
 */

export type {
  BridgeContractConfig,
  BridgeLedger,
  BridgeErrorCode,
} from "./types.js";
export {
  BridgeError,
  DEFAULT_MAX_BRIDGE_IN_AMOUNT,
  DEFAULT_BRIDGE_IN_COOLDOWN,
  REPLAY_CAPACITY,
} from "./types.js";

export { ReplayRegistry } from "./replay-registry.js";
export { InboundPacer } from "./pacing.js";
export { Lifecycle } from "./lifecycle.js";

export type { ValuePolicy, SweepPolicy, BridgeCoreOptions } from "./bridge-core.js";
export { BridgeCore, normalizeTransferId } from "./bridge-core.js";

export type { BridgeTokenConfig } from "./bridge-token.js";
export { BridgeToken } from "./bridge-token.js";

export type { BridgeVaultConfig } from "./bridge-vault.js";
export { BridgeVault } from "./bridge-vault.js";
