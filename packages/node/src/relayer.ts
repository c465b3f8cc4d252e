/**
 * @twinledger/node — Reference relayer.
 *
 * Watches `bridge.out` events on a source contract's stream and settles
 * them on the destination contract with `bridgeIn`. The bridge core does
 * not trust the relayer: caps, pacing and replay protection are enforced
 * by the destination whatever the relayer submits.
 *
 * Transfer ids are derived from the source chain tag and the event id,
 * so relaying the same event twice is caught by the destination's
 * replay registry.
 */

import { encodeAbiParameters, keccak256 } from "viem";
import type { Address, Amount, ChainTag, TransferId } from "@twinledger/types";
import { DEFAULT_CHAIN_TAG } from "@twinledger/types";
import type { EventStore, StoredEvent, Subscription } from "@twinledger/event-store";
import { BRIDGE_EVENTS, isBridgedOutPayload } from "@twinledger/event-store";
import { LedgerError } from "@twinledger/ledger";
import type { BridgeLedger } from "@twinledger/bridge";
import { BridgeError } from "@twinledger/bridge";
import type { Logger } from "./logger.js";

// =============================================================================
// Types
// =============================================================================

export interface RelayerOptions {
  /** Audit trail of the source chain */
  readonly sourceStore: EventStore;

  /** Bridge stream of the source contract, `bridge:<address>` */
  readonly sourceStream: string;
  readonly sourceChainTag: ChainTag;
  readonly destination: BridgeLedger;

  /** Must be the destination's bridge caller */
  readonly caller: Address;
  readonly logger: Logger;
}

export interface PendingTransfer {
  readonly transferId: TransferId;
  readonly recipient: string;
  readonly amount: Amount;
  readonly sourceEventId: string;
}

export interface FailedTransfer extends PendingTransfer {
  readonly code: string;
  readonly reason: string;
}

export interface RelayResult {
  readonly settled: number;
  readonly remaining: number;
  readonly failed: number;
}

/**
 * Transfer id of a relayed event: keccak256(abi(uint256 sourceChainTag,
 * string eventId)).
 */
export function deriveTransferId(sourceChainTag: ChainTag, eventId: string): TransferId {
  return keccak256(
    encodeAbiParameters([{ type: "uint256" }, { type: "string" }], [sourceChainTag, eventId]),
  );
}

// =============================================================================
// Relayer
// =============================================================================

export class Relayer {
  private readonly _options: RelayerOptions;
  private readonly _queue: PendingTransfer[] = [];
  private readonly _failed: FailedTransfer[] = [];
  private _subscription: Subscription | null = null;

  constructor(options: RelayerOptions) {
    this._options = options;
  }

  get pending(): readonly PendingTransfer[] {
    return this._queue;
  }

  get failed(): readonly FailedTransfer[] {
    return this._failed;
  }

  get running(): boolean {
    return this._subscription !== null;
  }

  /**
   * Queue every outbound event already on the stream, then follow it.
   */
  start(): void {
    if (this._subscription !== null) return;
    const { sourceStore, sourceStream } = this._options;
    for (const stored of sourceStore.read(sourceStream)) {
      this._observe(stored);
    }
    this._subscription = sourceStore.subscribe(sourceStream, (stored) => this._observe(stored));
  }

  stop(): void {
    this._subscription?.unsubscribe();
    this._subscription = null;
  }

  /**
   * Settle queued transfers in order.
   *
   * Stops at the first COOLDOWN_NOT_MET and keeps the rest queued.
   * Transfers the destination rejects for any other reason are moved to
   * `failed`.
   */
  relayPending(): RelayResult {
    const { destination, caller, sourceChainTag, logger } = this._options;
    let settled = 0;
    let failed = 0;

    while (this._queue.length > 0) {
      const [next] = this._queue;
      if (next === undefined) break;

      try {
        destination.bridgeIn(
          caller,
          next.recipient,
          next.amount,
          destination.getChainId(),
          next.transferId,
          sourceChainTag,
        );
      } catch (err) {
        if (!(err instanceof Error)) throw err;
        const code = err instanceof BridgeError || err instanceof LedgerError ? err.code : err.name;
        if (code === "COOLDOWN_NOT_MET") {
          logger.warn(
            { transferId: next.transferId, remaining: this._queue.length },
            "Destination cooldown not met; deferring",
          );
          break;
        }
        logger.warn(
          { transferId: next.transferId, sourceEventId: next.sourceEventId, code, reason: err.message },
          "Transfer rejected by destination",
        );
        this._queue.shift();
        this._failed.push({ ...next, code, reason: err.message });
        failed++;
        continue;
      }

      this._queue.shift();
      settled++;
      logger.info(
        { transferId: next.transferId, recipient: next.recipient, amount: next.amount.toString() },
        "Transfer settled",
      );
    }

    return { settled, remaining: this._queue.length, failed };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _observe(stored: StoredEvent): void {
    const { event } = stored;
    if (event.type !== BRIDGE_EVENTS.BRIDGED_OUT) return;
    const { destination, sourceChainTag, logger } = this._options;

    const { payload } = event;
    if (!isBridgedOutPayload(payload)) {
      logger.warn({ eventId: event.metadata.eventId }, "Malformed bridge.out payload");
      return;
    }

    const destinationTag = BigInt(payload.destinationChainTag);
    if (destinationTag !== DEFAULT_CHAIN_TAG && destinationTag !== destination.getChainId()) {
      logger.debug(
        { eventId: event.metadata.eventId, destinationTag: payload.destinationChainTag },
        "Not for this destination",
      );
      return;
    }

    const transfer: PendingTransfer = {
      transferId: deriveTransferId(sourceChainTag, event.metadata.eventId),
      recipient: payload.target,
      amount: BigInt(payload.amount),
      sourceEventId: event.metadata.eventId,
    };
    this._queue.push(transfer);
    logger.debug({ transferId: transfer.transferId, queued: this._queue.length }, "Transfer queued");
  }
}
