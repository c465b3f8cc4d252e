/**
 * @twinledger/node — Deployment, logging and the reference relayer.
 *
 * @packageDocumentation
 */

export { ConfigSchema, loadConfig, administratorOf } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger, attachAuditLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export { deployBridgePair, contractConfig } from "./deployment.js";
export type { BridgeDeployment, DeploymentOptions } from "./deployment.js";

export { Relayer, deriveTransferId } from "./relayer.js";
export type {
  RelayerOptions,
  PendingTransfer,
  FailedTransfer,
  RelayResult,
} from "./relayer.js";
