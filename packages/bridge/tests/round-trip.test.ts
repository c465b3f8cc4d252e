/**
 * Two ledgers, one relayer: value locked on the primary chain appears on
 * the secondary chain and flows back.
 */

import { describe, it, expect } from "vitest";
import { keccak256, encodeAbiParameters } from "viem";
import type { StoredEvent } from "@twinledger/event-store";
import { BRIDGE_EVENTS } from "@twinledger/event-store";
import type { BridgeLedger } from "../src/types.js";
import { ALICE, BOB, ONE, PRIMARY, RELAYER, SECONDARY, deployToken, deployVault } from "./helpers.js";

/** Settle every outbound event of `stream` on `destination`. */
function relay(events: readonly StoredEvent[], source: bigint, destination: BridgeLedger): number {
  let settled = 0;
  for (const stored of events) {
    if (stored.event.type !== BRIDGE_EVENTS.BRIDGED_OUT) continue;
    const { target, amount } = stored.event.payload;
    const id = keccak256(
      encodeAbiParameters(
        [{ type: "uint256" }, { type: "string" }],
        [source, stored.event.metadata.eventId],
      ),
    );
    destination.bridgeIn(RELAYER, String(target), BigInt(String(amount)), destination.getChainId(), id, source);
    settled++;
  }
  return settled;
}

describe("round trip", () => {
  it("conserves value across both ledgers", () => {
    const primary = deployVault();
    const secondary = deployToken();
    const { origin, vault } = primary;
    const { token } = secondary;

    origin.approve(ALICE, vault.address, 100n * ONE);
    vault.bridgeOut(ALICE, 100n * ONE, BOB, PRIMARY, SECONDARY);
    expect(relay(primary.chain.store.read(vault.core.streamId), PRIMARY, token)).toBe(1);

    expect(token.balanceOf(BOB)).toBe(100n * ONE);
    expect(token.totalSupply).toBe(vault.getVaultBalance());

    token.bridgeOut(BOB, 40n * ONE, ALICE, SECONDARY, PRIMARY);
    expect(relay(secondary.chain.store.read(token.core.streamId), SECONDARY, vault)).toBe(1);

    expect(origin.balanceOf(ALICE)).toBe(999_940n * ONE);
    expect(token.balanceOf(BOB)).toBe(60n * ONE);
    expect(token.totalSupply).toBe(60n * ONE);
    expect(vault.getVaultBalance()).toBe(60n * ONE);
  });

  it("refuses to settle the same event twice", () => {
    const primary = deployVault();
    const secondary = deployToken();
    primary.origin.approve(ALICE, primary.vault.address, ONE);
    primary.vault.bridgeOut(ALICE, ONE, BOB, PRIMARY, SECONDARY);

    const events = primary.chain.store.read(primary.vault.core.streamId);
    relay(events, PRIMARY, secondary.token);
    secondary.advance(3600);

    expect(() => relay(events, PRIMARY, secondary.token)).toThrow(/already processed/);
    expect(secondary.token.totalSupply).toBe(ONE);
  });

  it("keeps both event logs intact", () => {
    const primary = deployVault();
    const secondary = deployToken();
    primary.origin.approve(ALICE, primary.vault.address, ONE);
    primary.vault.bridgeOut(ALICE, ONE, BOB, PRIMARY, SECONDARY);
    relay(primary.chain.store.read(primary.vault.core.streamId), PRIMARY, secondary.token);

    expect(primary.chain.store.verifyIntegrity().valid).toBe(true);
    expect(secondary.chain.store.verifyIntegrity().valid).toBe(true);
  });
});
