/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { administratorOf, loadConfig } from "../src/config.js";
import { SIGNER_ADDRESSES } from "./helpers.js";

const SIGNERS = SIGNER_ADDRESSES.join(",");

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ SIGNERS });

    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.CHAIN_ID_PRIMARY).toBe(31337n);
    expect(config.CHAIN_ID_SECONDARY).toBe(31338n);
    expect(config.MAX_BRIDGE_IN_AMOUNT).toBe(10_000n * 10n ** 18n);
    expect(config.BRIDGE_IN_COOLDOWN_SECONDS).toBe(60);
    expect(config.REPLAY_CAPACITY).toBe(100);
    expect(config.VAULT_PAUSE_BLOCKS_INBOUND).toBe(false);
    expect(config.BRIDGE_IN_CALLER).toBeUndefined();
    expect(config.TOKEN_DECIMALS).toBe(18);
    expect(config.SIGNERS).toEqual(SIGNER_ADDRESSES);
  });

  it("defaults the administrator to the first signer", () => {
    expect(administratorOf(loadConfig({ SIGNERS }))).toBe(SIGNER_ADDRESSES[0]);

    const config = loadConfig({ SIGNERS, ADMINISTRATOR: "0x0000000000000000000000000000000000000009" });
    expect(administratorOf(config)).toBe("0x0000000000000000000000000000000000000009");
  });

  it("trims signer addresses", () => {
    const config = loadConfig({
      SIGNERS: ` ${SIGNER_ADDRESSES.join(" , ")} `,
      BRIDGE_IN_CALLER: " 0x0000000000000000000000000000000000000007 ",
    });
    expect(config.SIGNERS).toEqual(SIGNER_ADDRESSES);
    expect(config.BRIDGE_IN_CALLER).toBe("0x0000000000000000000000000000000000000007");
  });

  it("parses numeric and boolean overrides", () => {
    const config = loadConfig({
      SIGNERS,
      CHAIN_ID_PRIMARY: "1",
      CHAIN_ID_SECONDARY: "10",
      MAX_BRIDGE_IN_AMOUNT: "5000",
      BRIDGE_IN_COOLDOWN_SECONDS: "0",
      REPLAY_CAPACITY: "8",
      VAULT_PAUSE_BLOCKS_INBOUND: "true",
    });

    expect(config.CHAIN_ID_PRIMARY).toBe(1n);
    expect(config.CHAIN_ID_SECONDARY).toBe(10n);
    expect(config.MAX_BRIDGE_IN_AMOUNT).toBe(5000n);
    expect(config.BRIDGE_IN_COOLDOWN_SECONDS).toBe(0);
    expect(config.REPLAY_CAPACITY).toBe(8);
    expect(config.VAULT_PAUSE_BLOCKS_INBOUND).toBe(true);
  });

  it("requires exactly four valid signers", () => {
    expect(() => loadConfig({})).toThrow(ZodError);
    expect(() => loadConfig({ SIGNERS: SIGNER_ADDRESSES.slice(0, 3).join(",") })).toThrow(ZodError);
    expect(() => loadConfig({ SIGNERS: `${SIGNERS},0x0000000000000000000000000000000000000005` })).toThrow(
      ZodError,
    );
    expect(() => loadConfig({ SIGNERS: SIGNERS.replace("0x0000", "0xzz00") })).toThrow(ZodError);
  });

  it("rejects invalid bridge settings", () => {
    expect(() => loadConfig({ SIGNERS, MAX_BRIDGE_IN_AMOUNT: "-1" })).toThrow(ZodError);
    expect(() => loadConfig({ SIGNERS, BRIDGE_IN_COOLDOWN_SECONDS: "-1" })).toThrow(ZodError);
    expect(() => loadConfig({ SIGNERS, REPLAY_CAPACITY: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ SIGNERS, BRIDGE_IN_CALLER: "relayer" })).toThrow(ZodError);
  });

  it("rejects equal or reserved chain ids", () => {
    expect(() => loadConfig({ SIGNERS, CHAIN_ID_PRIMARY: "5", CHAIN_ID_SECONDARY: "5" })).toThrow(
      "Primary and secondary chain ids must differ",
    );
    expect(() => loadConfig({ SIGNERS, CHAIN_ID_PRIMARY: "0" })).toThrow("Chain id 0 is reserved");
  });
});
