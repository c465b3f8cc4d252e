import { privateKeyToAccount } from "viem/accounts";
import type { PrivateKeyAccount } from "viem/accounts";
import type { Hex } from "@twinledger/types";
import { Chain, ReentrancyGuard } from "@twinledger/ledger";
import { OperationBook } from "../src/operation-book.js";
import { BURN_MINT_OPERATION_CODES } from "../src/operations.js";
import { SignerRegistry } from "../src/signer-registry.js";
import { signOperationHash } from "../src/signing.js";
import type { OperationCodeTable, OperationEffects } from "../src/types.js";

/** Placeholder key n (1-based), e.g. 0x00…01. */
export function testAccount(n: number): PrivateKeyAccount {
  return privateKeyToAccount(`0x${n.toString(16).padStart(64, "0")}`);
}

export const SIGNERS = [testAccount(1), testAccount(2), testAccount(3), testAccount(4)] as const;
export const [A, B, C, D] = SIGNERS;
export const OUTSIDER = testAccount(5);
export const ADMIN = testAccount(6);

export const START = 1_700_000_000;

export interface Harness {
  readonly chain: Chain;
  readonly book: OperationBook;
  readonly registry: SignerRegistry;
  readonly guard: ReentrancyGuard;
  readonly applied: string[];
  advance(seconds: number): void;
  halt(): void;
}

export function setup(options?: {
  chainId?: bigint;
  codes?: OperationCodeTable;
  effects?: Partial<OperationEffects>;
  relinquish?: boolean;
}): Harness {
  let now = START;
  let halted = false;
  const chain = new Chain({ chainId: options?.chainId ?? 31337n, clock: () => now });
  const registry = new SignerRegistry(
    chain,
    SIGNERS.map((s) => s.address),
    ADMIN.address,
  );
  const guard = new ReentrancyGuard();
  const applied: string[] = [];

  const effects: OperationEffects = {
    pause: () => applied.push("pause"),
    unpause: () => applied.push("unpause"),
    setBridgeInCaller: (caller) => applied.push(`setBridgeInCaller:${caller}`),
    setBridgeInLimits: (max, cooldown) => applied.push(`setBridgeInLimits:${max}:${cooldown}`),
    setBridgeInEnabled: (enabled) => applied.push(`setBridgeInEnabled:${enabled}`),
    setBridgeOutEnabled: (enabled) => applied.push(`setBridgeOutEnabled:${enabled}`),
    ...(options?.relinquish === true ? { relinquish: () => applied.push("relinquish") } : {}),
    ...options?.effects,
  };

  const book = new OperationBook({
    chain,
    contract: chain.deployAddress("bridge"),
    registry,
    codes: options?.codes ?? BURN_MINT_OPERATION_CODES,
    effects,
    guard,
    isHalted: () => halted,
  });

  return {
    chain,
    book,
    registry,
    guard,
    applied,
    advance: (seconds) => {
      now += seconds;
    },
    halt: () => {
      halted = true;
    },
  };
}

export function sign(book: OperationBook, account: PrivateKeyAccount, operationId: Hex): Promise<Hex> {
  return signOperationHash(account, book.getOperationHash(operationId));
}

/**
 * Submit each account's own signature in order.
 */
export async function approve(
  book: OperationBook,
  accounts: readonly PrivateKeyAccount[],
  operationId: Hex,
): Promise<void> {
  for (const account of accounts) {
    await book.submitSignature(account.address, operationId, await sign(book, account, operationId));
  }
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
