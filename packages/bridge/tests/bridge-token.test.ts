/**
 * Tests for BridgeToken — burn-and-mint bridge accounting.
 */

import { describe, it, expect } from "vitest";
import { ZERO_ADDRESS } from "@twinledger/types";
import { BRIDGE_EVENTS } from "@twinledger/event-store";
import { BURN_MINT_OPERATION_CODES as CODES, encodeLimitsPayload } from "@twinledger/governance";
import { DEFAULT_BRIDGE_IN_COOLDOWN, DEFAULT_MAX_BRIDGE_IN_AMOUNT } from "../src/types.js";
import {
  A,
  ALICE,
  BOB,
  ONE,
  PRIMARY,
  RELAYER,
  SECONDARY,
  START,
  catchError,
  deployToken,
  govern,
  transferId,
} from "./helpers.js";

function funded() {
  const deployed = deployToken();
  deployed.token.bridgeIn(RELAYER, ALICE, 1000n * ONE, SECONDARY, transferId(0), PRIMARY);
  deployed.advance(DEFAULT_BRIDGE_IN_COOLDOWN);
  return deployed;
}

describe("deployment", () => {
  it("starts with defaults", () => {
    const { token } = deployToken();
    expect(token.getChainId()).toBe(SECONDARY);
    expect(token.maxBridgeInAmount).toBe(DEFAULT_MAX_BRIDGE_IN_AMOUNT);
    expect(token.bridgeInCooldown).toBe(60);
    expect(token.bridgeInEnabled).toBe(true);
    expect(token.bridgeOutEnabled).toBe(true);
    expect(token.paused).toBe(false);
    expect(token.totalSupply).toBe(0n);
    expect(token.isSigner(A.address)).toBe(true);
    expect(token.isSigner("not-an-address")).toBe(false);
  });

  it("leaves the bridge caller unset unless configured", () => {
    const { token } = deployToken({ bridgeInCaller: undefined });
    expect(token.bridgeInCaller).toBe(ZERO_ADDRESS);
    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, transferId(1)))).toMatchObject({
      code: "NOT_BRIDGE_CALLER",
    });
  });
});

describe("bridgeIn", () => {
  it("mints to the recipient and records the transfer", () => {
    const { token, chain } = deployToken();
    token.bridgeIn(RELAYER, ALICE, 5n * ONE, SECONDARY, transferId(1), PRIMARY);

    expect(token.balanceOf(ALICE)).toBe(5n * ONE);
    expect(token.getVaultBalance()).toBe(5n * ONE);
    expect(token.isProcessed(transferId(1))).toBe(true);

    const events = chain.store.read(token.core.streamId);
    expect(events).toHaveLength(1);
    expect(events[0]!.event.type).toBe(BRIDGE_EVENTS.BRIDGED_IN);
    expect(events[0]!.event.payload).toEqual({
      recipient: ALICE,
      amount: (5n * ONE).toString(),
      chainTag: "31338",
      transferId: transferId(1),
      sourceChainTag: "31337",
      timestamp: START,
    });
  });

  it("only accepts the bridge caller", () => {
    const { token } = deployToken();
    expect(catchError(() => token.bridgeIn(ALICE, ALICE, ONE, SECONDARY, transferId(1)))).toMatchObject({
      code: "NOT_BRIDGE_CALLER",
      message: "Not authorized to bridge in",
    });
  });

  it("rejects a call tagged for another chain", () => {
    const { token } = deployToken();
    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, ONE, PRIMARY, transferId(1)))).toMatchObject({
      code: "INVALID_CHAIN_TAG",
    });
  });

  it("rejects a source tag equal to its own chain", () => {
    const { token } = deployToken();
    expect(
      catchError(() => token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, transferId(1), SECONDARY)),
    ).toMatchObject({ code: "INVALID_CHAIN_TAG" });
  });

  it("rejects zero and over-cap amounts", () => {
    const { token } = deployToken();
    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, 0n, SECONDARY, transferId(1)))).toMatchObject({
      code: "ZERO_AMOUNT",
    });
    expect(
      catchError(() => token.bridgeIn(RELAYER, ALICE, 10_001n * ONE, SECONDARY, transferId(1))),
    ).toMatchObject({ code: "AMOUNT_EXCEEDS_LIMIT", message: "Amount exceeds bridge-in limit" });
  });

  it("accepts exactly the cap", () => {
    const { token } = deployToken();
    token.bridgeIn(RELAYER, ALICE, 10_000n * ONE, SECONDARY, transferId(1));
    expect(token.balanceOf(ALICE)).toBe(10_000n * ONE);
  });

  it("rejects the zero recipient and malformed transfer ids", () => {
    const { token } = deployToken();
    expect(catchError(() => token.bridgeIn(RELAYER, ZERO_ADDRESS, ONE, SECONDARY, transferId(1)))).toMatchObject({
      code: "INVALID_ADDRESS",
    });
    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, "0x1234"))).toMatchObject({
      code: "INVALID_TRANSFER_ID",
    });
  });

  it("enforces the cooldown between any two settlements", () => {
    const { token, advance } = deployToken();
    token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, transferId(1));
    advance(DEFAULT_BRIDGE_IN_COOLDOWN - 1);

    expect(catchError(() => token.bridgeIn(RELAYER, BOB, ONE, SECONDARY, transferId(2)))).toMatchObject({
      code: "COOLDOWN_NOT_MET",
    });

    advance(1);
    token.bridgeIn(RELAYER, BOB, ONE, SECONDARY, transferId(2));
    expect(token.balanceOf(BOB)).toBe(ONE);
  });

  it("rejects a transfer id it has already settled, in any letter case", () => {
    const { token, advance } = deployToken();
    const id = transferId(1);
    token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, id);
    advance(DEFAULT_BRIDGE_IN_COOLDOWN);

    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, id))).toMatchObject({
      code: "ALREADY_PROCESSED",
    });
    expect(
      catchError(() => token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, `0x${id.slice(2).toUpperCase()}`)),
    ).toMatchObject({ code: "ALREADY_PROCESSED" });
  });

  it("does not start the cooldown on a rejected settlement", () => {
    const { token } = deployToken();
    catchError(() => token.bridgeIn(RELAYER, ALICE, 10_001n * ONE, SECONDARY, transferId(1)));

    token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, transferId(1));
    expect(token.core.pacer.lastSettlement).toBe(START);
  });
});

describe("bridgeOut", () => {
  it("burns from the caller and announces the transfer", () => {
    const { token, chain } = funded();
    token.bridgeOut(ALICE, 400n * ONE, BOB, SECONDARY, PRIMARY);

    expect(token.balanceOf(ALICE)).toBe(600n * ONE);
    expect(token.totalSupply).toBe(600n * ONE);

    const last = chain.store.read(token.core.streamId).at(-1);
    expect(last?.event.type).toBe(BRIDGE_EVENTS.BRIDGED_OUT);
    expect(last?.event.payload).toEqual({
      from: ALICE,
      amount: (400n * ONE).toString(),
      target: BOB,
      chainTag: "31338",
      destinationChainTag: "31337",
      timestamp: START + DEFAULT_BRIDGE_IN_COOLDOWN,
    });
  });

  it("accepts an omitted destination tag", () => {
    const { token, chain } = funded();
    token.bridgeOut(ALICE, ONE, BOB, SECONDARY);

    const last = chain.store.read(token.core.streamId).at(-1);
    expect(last?.event.payload).toMatchObject({ destinationChainTag: "0" });
  });

  it("rejects wrong chain tags", () => {
    const { token } = funded();
    expect(catchError(() => token.bridgeOut(ALICE, ONE, BOB, PRIMARY))).toMatchObject({
      code: "INVALID_CHAIN_TAG",
      message: "Invalid chain ID",
    });
    expect(catchError(() => token.bridgeOut(ALICE, ONE, BOB, SECONDARY, SECONDARY))).toMatchObject({
      code: "SAME_CHAIN_DESTINATION",
    });
  });

  it("applies the per-transfer cap to outbound transfers too", () => {
    const { token } = deployToken({ maxBridgeInAmount: 100n });
    token.bridgeIn(RELAYER, ALICE, 100n, SECONDARY, transferId(1));

    expect(catchError(() => token.bridgeOut(ALICE, 101n, BOB, SECONDARY))).toMatchObject({
      code: "AMOUNT_EXCEEDS_LIMIT",
    });
  });

  it("rejects zero amounts, the zero target and overdrafts", () => {
    const { token } = funded();
    expect(catchError(() => token.bridgeOut(ALICE, 0n, BOB, SECONDARY))).toMatchObject({ code: "ZERO_AMOUNT" });
    expect(catchError(() => token.bridgeOut(ALICE, ONE, ZERO_ADDRESS, SECONDARY))).toMatchObject({
      code: "INVALID_ADDRESS",
    });
    expect(catchError(() => token.bridgeOut(BOB, ONE, ALICE, SECONDARY))).toMatchObject({
      code: "INSUFFICIENT_BALANCE",
    });
  });
});

describe("governed parameters", () => {
  it("changes the bridge caller", async () => {
    const { token } = deployToken();
    await govern(token, CODES.setBridgeInCaller, BOB, 0n);

    expect(token.bridgeInCaller).toBe(BOB);
    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, transferId(1)))).toMatchObject({
      code: "NOT_BRIDGE_CALLER",
    });
    token.bridgeIn(BOB, ALICE, ONE, SECONDARY, transferId(1));
  });

  it("changes cap and cooldown together", async () => {
    const { token, advance } = deployToken();
    await govern(token, CODES.setBridgeInLimits, ALICE, 50n, encodeLimitsPayload(61));

    expect(token.maxBridgeInAmount).toBe(50n);
    expect(token.bridgeInCooldown).toBe(61);

    token.bridgeIn(RELAYER, ALICE, 50n, SECONDARY, transferId(1));
    advance(60);
    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, 1n, SECONDARY, transferId(2)))).toMatchObject({
      code: "COOLDOWN_NOT_MET",
    });
    advance(1);
    token.bridgeIn(RELAYER, ALICE, 1n, SECONDARY, transferId(2));
  });

  it("disables each direction independently", async () => {
    const { token } = funded();
    await govern(token, CODES.setBridgeOutEnabled, ALICE, 0n);
    expect(catchError(() => token.bridgeOut(ALICE, ONE, BOB, SECONDARY))).toMatchObject({
      code: "BRIDGE_OUT_DISABLED",
    });

    await govern(token, CODES.setBridgeInEnabled, ALICE, 0n);
    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, ONE, SECONDARY, transferId(9)))).toMatchObject({
      code: "BRIDGE_IN_DISABLED",
    });

    await govern(token, CODES.setBridgeOutEnabled, ALICE, 1n);
    token.bridgeOut(ALICE, ONE, BOB, SECONDARY);
  });

  it("has no relinquish operation", () => {
    const { token } = deployToken();
    expect(catchError(() => token.requestOperation(A.address, 7, ALICE, 0n))).toMatchObject({
      code: "UNKNOWN_OPERATION_TYPE",
    });
  });
});

describe("pause", () => {
  it("blocks every balance change until unpaused", async () => {
    const { token } = funded();
    await govern(token, CODES.pause, ALICE, 0n);
    expect(token.paused).toBe(true);

    expect(catchError(() => token.transfer(ALICE, BOB, ONE))).toMatchObject({ code: "PAUSED" });
    expect(catchError(() => token.bridgeOut(ALICE, ONE, BOB, SECONDARY))).toMatchObject({ code: "PAUSED" });
    expect(catchError(() => token.bridgeIn(RELAYER, BOB, ONE, SECONDARY, transferId(5)))).toMatchObject({
      code: "PAUSED",
    });

    await govern(token, CODES.unpause, ALICE, 0n);
    token.transfer(ALICE, BOB, ONE);
    expect(token.balanceOf(BOB)).toBe(ONE);
  });

  it("cannot be paused twice", async () => {
    const { token } = deployToken();
    await govern(token, CODES.pause, ALICE, 0n);
    await expect(govern(token, CODES.pause, ALICE, 0n)).rejects.toMatchObject({ code: "PAUSED" });
  });

  it("logs lifecycle changes", async () => {
    const { token, chain } = deployToken();
    await govern(token, CODES.pause, ALICE, 0n);

    const types = chain.store.read(token.core.streamId).map((e) => e.event.type);
    expect(types).toEqual([BRIDGE_EVENTS.PAUSED]);
  });
});

describe("replay horizon", () => {
  it("reopens an id only after 100 later settlements", () => {
    const { token } = deployToken({ bridgeInCooldown: 0 });
    for (let i = 0; i < 100; i++) {
      token.bridgeIn(RELAYER, ALICE, 1n, SECONDARY, transferId(i));
    }
    expect(catchError(() => token.bridgeIn(RELAYER, ALICE, 1n, SECONDARY, transferId(0)))).toMatchObject({
      code: "ALREADY_PROCESSED",
    });

    token.bridgeIn(RELAYER, ALICE, 1n, SECONDARY, transferId(100));
    expect(token.isProcessed(transferId(0))).toBe(false);
    expect(token.isProcessed(transferId(1))).toBe(true);

    token.bridgeIn(RELAYER, ALICE, 1n, SECONDARY, transferId(0));
    expect(token.balanceOf(ALICE)).toBe(102n);
  });
});
