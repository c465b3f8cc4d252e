import type { DestinationStream } from "pino";
import type { Address } from "@twinledger/types";
import { loadConfig } from "../src/config.js";
import type { AppConfig } from "../src/config.js";

export const SIGNER_ADDRESSES: readonly Address[] = [
  "0x0000000000000000000000000000000000000001",
  "0x0000000000000000000000000000000000000002",
  "0x0000000000000000000000000000000000000003",
  "0x0000000000000000000000000000000000000004",
];

export const RELAYER: Address = "0x0000000000000000000000000000000000000007";
export const ALICE: Address = "0x1111111111111111111111111111111111111111";
export const BOB: Address = "0x2222222222222222222222222222222222222222";

export const ONE = 10n ** 18n;
export const START = 1_700_000_000;

export function testConfig(env: Record<string, string | undefined> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: "test",
    SIGNERS: SIGNER_ADDRESSES.join(","),
    BRIDGE_IN_CALLER: RELAYER,
    ...env,
  });
}

/** A pino destination that keeps every line as parsed JSON. */
export function captureLogs(): { stream: DestinationStream; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    stream: {
      write(msg: string) {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  };
}

export function manualClock(): { clock: () => number; advance: (seconds: number) => void } {
  let now = START;
  return {
    clock: () => now,
    advance: (seconds) => {
      now += seconds;
    },
  };
}
