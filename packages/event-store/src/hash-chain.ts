/**
 * @twinledger/event-store — Hash chain for the tamper-evident audit trail.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Editing, dropping or reordering any event breaks the chain from that
 * point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: UnhashedStoredEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  event: UnhashedStoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify the hash chain of a sequence of events in global position order.
 *
 * Reports every broken link and every hash that does not match its
 * recomputed value; verification continues past the first error so a
 * single report covers the whole log.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const event of events) {
    if (event.previousHash !== expectedPrevious) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${expectedPrevious}", got "${event.previousHash}"`,
      });
    }

    const recomputed = computeEventHash(event, event.previousHash);
    if (event.hash !== recomputed) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${recomputed}", got "${event.hash}"`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }
    expectedPrevious = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
