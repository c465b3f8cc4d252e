/**
 * @twinledger/node — Logging.
 *
 * pino loggers for the deployment, and an audit logger that writes one
 * line per committed event of an event store.
 */

import { pino } from "pino";
import type { DestinationStream, Logger } from "pino";
import type { EventStore, Subscription } from "@twinledger/event-store";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

/**
 * Create the process logger.
 *
 * Pretty-printed in development unless an explicit destination is given.
 */
export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/**
 * Log every event `store` commits, in global order.
 *
 * @returns The subscription; unsubscribe to stop logging
 */
export function attachAuditLogger(store: EventStore, logger: Logger): Subscription {
  return store.subscribeAll((stored) => {
    const { type, metadata } = stored.event;
    logger.info(
      {
        streamId: stored.streamId,
        position: stored.globalPosition,
        version: stored.version,
        type,
        eventId: metadata.eventId,
        actor: metadata.actor,
        correlationId: metadata.correlationId,
        hash: stored.hash,
      },
      type,
    );
  });
}
