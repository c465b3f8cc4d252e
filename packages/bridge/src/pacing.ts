/**
 * Inbound pacing: one global minimum gap between any two successful
 * inbound settlements, whoever the recipient.
 */

import type { Journal } from "@twinledger/ledger";
import { JournaledCell } from "@twinledger/ledger";
import { BridgeError } from "./types.js";

export class InboundPacer {
  private readonly _cooldown: JournaledCell<number>;
  private readonly _lastSettlement: JournaledCell<number>;

  constructor(journal: Journal, cooldown: number) {
    assertCooldown(cooldown);
    this._cooldown = new JournaledCell(journal, cooldown);
    this._lastSettlement = new JournaledCell(journal, 0);
  }

  get cooldown(): number {
    return this._cooldown.value;
  }

  /** Unix seconds of the last settlement; 0 before the first. */
  get lastSettlement(): number {
    return this._lastSettlement.value;
  }

  get nextAllowedAt(): number {
    return this._lastSettlement.value + this._cooldown.value;
  }

  setCooldown(cooldown: number): void {
    assertCooldown(cooldown);
    this._cooldown.set(cooldown);
  }

  assertReady(now: number): void {
    if (now < this.nextAllowedAt) {
      throw new BridgeError(
        "COOLDOWN_NOT_MET",
        `Bridge-in cooldown not met: next settlement allowed at ${this.nextAllowedAt}, now ${now}`,
      );
    }
  }

  record(now: number): void {
    this._lastSettlement.set(now);
  }
}

function assertCooldown(cooldown: number): void {
  if (!Number.isSafeInteger(cooldown) || cooldown < 0) {
    throw new BridgeError("INVALID_CONFIGURATION", `Cooldown must be a non-negative integer, got ${cooldown}`);
  }
}
