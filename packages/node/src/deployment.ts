/**
 * @twinledger/node — Deployment.
 *
 * Wires a bridge pair from configuration: the origin token and its
 * lock-and-release vault on the primary chain, the burn-and-mint
 * representation on the secondary chain.
 *
 * Both chains validate every event against the bridge catalog.
 */

import type { Address, Amount, ChainTag } from "@twinledger/types";
import type { SubscriberErrorHandler } from "@twinledger/event-store";
import { InMemoryEventStore, createBridgeCatalog } from "@twinledger/event-store";
import type { Clock } from "@twinledger/ledger";
import { Chain, FixedSupplyToken } from "@twinledger/ledger";
import type { TokenLedger } from "@twinledger/ledger";
import type { BridgeContractConfig } from "@twinledger/bridge";
import { BridgeToken, BridgeVault } from "@twinledger/bridge";
import type { AppConfig } from "./config.js";
import { administratorOf } from "./config.js";

export interface BridgeDeployment {
  readonly primary: Chain;
  readonly secondary: Chain;

  /** The custodied token on the primary chain */
  readonly origin: TokenLedger;
  readonly vault: BridgeVault;

  /** Its representation on the secondary chain */
  readonly token: BridgeToken;
}

export interface DeploymentOptions {
  /** Receives the whole origin supply. Default: the administrator */
  readonly originHolder?: Address;

  /** Default: ORIGIN_SUPPLY */
  readonly originSupply?: Amount;

  /** Shared by both chains. Default: the wall clock */
  readonly clock?: Clock;

  /** A throwing audit subscriber is reported here, never to the caller */
  readonly onSubscriberError?: SubscriberErrorHandler;
}

/**
 * Governance and bridge settings common to both contracts.
 */
export function contractConfig(config: AppConfig): BridgeContractConfig {
  return {
    signers: config.SIGNERS,
    administrator: administratorOf(config),
    bridgeInCaller: config.BRIDGE_IN_CALLER,
    maxBridgeInAmount: config.MAX_BRIDGE_IN_AMOUNT,
    bridgeInCooldown: config.BRIDGE_IN_COOLDOWN_SECONDS,
    replayCapacity: config.REPLAY_CAPACITY,
  };
}

export function deployBridgePair(
  config: AppConfig,
  options: DeploymentOptions = {},
): BridgeDeployment {
  const catalog = createBridgeCatalog();
  const chainOn = (chainId: ChainTag): Chain =>
    new Chain({
      chainId,
      clock: options.clock,
      catalog,
      store: new InMemoryEventStore({ onSubscriberError: options.onSubscriberError }),
    });
  const primary = chainOn(config.CHAIN_ID_PRIMARY);
  const secondary = chainOn(config.CHAIN_ID_SECONDARY);
  const shared = contractConfig(config);

  const origin = new FixedSupplyToken(
    primary,
    { name: config.TOKEN_NAME, symbol: config.TOKEN_SYMBOL, decimals: config.TOKEN_DECIMALS },
    options.originHolder ?? administratorOf(config),
    options.originSupply ?? config.ORIGIN_SUPPLY,
  );
  const vault = new BridgeVault(primary, origin, {
    ...shared,
    pauseBlocksInbound: config.VAULT_PAUSE_BLOCKS_INBOUND,
  });
  const token = new BridgeToken(secondary, {
    ...shared,
    name: `${config.TOKEN_NAME} (bridged)`,
    symbol: config.TOKEN_SYMBOL,
    decimals: config.TOKEN_DECIMALS,
  });

  return { primary, secondary, origin, vault, token };
}
