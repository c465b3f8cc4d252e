/**
 * @twinledger/node — Entry point.
 *
 * Loads config, deploys a bridge pair, logs both audit trails and runs a
 * relayer in each direction until SIGINT / SIGTERM.
 */

import { loadConfig } from "./config.js";
import { deployBridgePair } from "./deployment.js";
import { attachAuditLogger, createLogger } from "./logger.js";
import { Relayer } from "./relayer.js";

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config);

  const deployment = deployBridgePair(config, {
    onSubscriberError: (err, event) => {
      logger.error(
        { err, eventId: event.event.metadata.eventId, type: event.event.type },
        "Event subscriber failed",
      );
    },
  });
  const { primary, secondary, origin, vault, token } = deployment;

  const audits = [
    attachAuditLogger(primary.store, logger.child({ chainId: primary.chainId.toString() })),
    attachAuditLogger(secondary.store, logger.child({ chainId: secondary.chainId.toString() })),
  ];

  logger.info(
    {
      primary: primary.chainId.toString(),
      secondary: secondary.chainId.toString(),
      origin: origin.address,
      vault: vault.address,
      token: token.address,
    },
    "Bridge pair deployed",
  );

  const caller = config.BRIDGE_IN_CALLER;
  if (caller === undefined) {
    logger.warn("No BRIDGE_IN_CALLER configured; relayer disabled");
    return;
  }

  const relayers = [
    new Relayer({
      sourceStore: primary.store,
      sourceStream: vault.core.streamId,
      sourceChainTag: primary.chainId,
      destination: token,
      caller,
      logger: logger.child({ relayer: "primary->secondary" }),
    }),
    new Relayer({
      sourceStore: secondary.store,
      sourceStream: token.core.streamId,
      sourceChainTag: secondary.chainId,
      destination: vault,
      caller,
      logger: logger.child({ relayer: "secondary->primary" }),
    }),
  ];
  for (const relayer of relayers) relayer.start();

  const timer = setInterval(() => {
    for (const relayer of relayers) relayer.relayPending();
  }, config.RELAY_INTERVAL_MS);

  logger.info({ intervalMs: config.RELAY_INTERVAL_MS }, "Relayers started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    clearInterval(timer);
    for (const relayer of relayers) relayer.stop();
    for (const audit of audits) audit.unsubscribe();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
