import type { Address, Amount } from "@twinledger/types";
import { Chain } from "../src/chain.js";
import { TokenLedger } from "../src/token-ledger.js";

export const ALICE: Address = "0x1111111111111111111111111111111111111111";
export const BOB: Address = "0x2222222222222222222222222222222222222222";
export const CAROL: Address = "0x3333333333333333333333333333333333333333";

/**
 * Token with public supply controls.
 */
export class TestToken extends TokenLedger {
  mint(to: Address, amount: Amount): void {
    this.mintTo(to, amount);
  }

  burn(from: Address, amount: Amount): void {
    this.burnFrom(from, amount);
  }
}

export function makeChain(chainId = 31337n): { chain: Chain; advance: (seconds: number) => void } {
  let now = 1_700_000_000;
  const chain = new Chain({ chainId, clock: () => now });
  return {
    chain,
    advance: (seconds) => {
      now += seconds;
    },
  };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
