/**
 * Lifecycle Controller
 *
 * active ⇄ paused (quorum operations only)
 * active | paused → halted (relinquish, once, never reversed)
 */

import type { LifecycleState } from "@twinledger/types";
import type { Journal } from "@twinledger/ledger";
import { JournaledCell } from "@twinledger/ledger";
import { BridgeError } from "./types.js";

export class Lifecycle {
  private readonly _state: JournaledCell<LifecycleState>;

  constructor(journal: Journal) {
    this._state = new JournaledCell<LifecycleState>(journal, "active");
  }

  get state(): LifecycleState {
    return this._state.value;
  }

  get paused(): boolean {
    return this._state.value === "paused";
  }

  get halted(): boolean {
    return this._state.value === "halted";
  }

  pause(): void {
    this.assertNotHalted();
    if (this.paused) {
      throw new BridgeError("PAUSED", "Already paused");
    }
    this._state.set("paused");
  }

  unpause(): void {
    this.assertNotHalted();
    if (!this.paused) {
      throw new BridgeError("NOT_PAUSED", "Not paused");
    }
    this._state.set("active");
  }

  halt(): void {
    this.assertNotHalted();
    this._state.set("halted");
  }

  assertNotHalted(): void {
    if (this.halted) {
      throw new BridgeError("HALTED", "Contract is halted");
    }
  }

  assertNotPaused(): void {
    if (this.paused) {
      throw new BridgeError("PAUSED", "Contract is paused");
    }
  }
}
