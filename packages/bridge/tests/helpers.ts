import { privateKeyToAccount } from "viem/accounts";
import type { PrivateKeyAccount } from "viem/accounts";
import { keccak256, toHex } from "viem";
import type { Address, Hex, TransferId } from "@twinledger/types";
import { Chain, FixedSupplyToken } from "@twinledger/ledger";
import { signOperationHash } from "@twinledger/governance";
import { BridgeToken } from "../src/bridge-token.js";
import type { BridgeTokenConfig } from "../src/bridge-token.js";
import { BridgeVault } from "../src/bridge-vault.js";
import type { BridgeVaultConfig } from "../src/bridge-vault.js";
import type { BridgeLedger } from "../src/types.js";

export function testAccount(n: number): PrivateKeyAccount {
  return privateKeyToAccount(`0x${n.toString(16).padStart(64, "0")}`);
}

export const [A, B, C, D] = [testAccount(1), testAccount(2), testAccount(3), testAccount(4)];
export const ADMIN = testAccount(6);
export const RELAYER = testAccount(7).address;

export const ALICE: Address = "0x1111111111111111111111111111111111111111";
export const BOB: Address = "0x2222222222222222222222222222222222222222";

export const PRIMARY = 31337n;
export const SECONDARY = 31338n;
export const ONE = 10n ** 18n;
export const START = 1_700_000_000;

const GOVERNANCE = {
  signers: [A.address, B.address, C.address, D.address],
  administrator: ADMIN.address,
  bridgeInCaller: RELAYER,
};

function manualChain(chainId: bigint): { chain: Chain; advance: (seconds: number) => void } {
  let now = START;
  return {
    chain: new Chain({ chainId, clock: () => now }),
    advance: (seconds) => {
      now += seconds;
    },
  };
}

export function deployToken(overrides: Partial<BridgeTokenConfig> = {}) {
  const { chain, advance } = manualChain(SECONDARY);
  const token = new BridgeToken(chain, { name: "Bridged", symbol: "BRG", ...GOVERNANCE, ...overrides });
  return { chain, token, advance };
}

export function deployVault(overrides: Partial<BridgeVaultConfig> = {}) {
  const { chain, advance } = manualChain(PRIMARY);
  const origin = new FixedSupplyToken(chain, { name: "Origin", symbol: "ORG" }, ALICE, 1_000_000n * ONE);
  const vault = new BridgeVault(chain, origin, { ...GOVERNANCE, ...overrides });
  return { chain, origin, vault, advance };
}

/**
 * Request an operation and have A, B and C approve it.
 */
export async function govern(
  contract: BridgeLedger,
  operationType: number,
  target: string,
  value: bigint,
  data?: string,
): Promise<Hex> {
  const id = contract.requestOperation(A.address, operationType, target, value, data);
  for (const signer of [A, B, C]) {
    const signature = await signOperationHash(signer, contract.getOperationHash(id));
    await contract.submitSignature(signer.address, id, signature);
  }
  return id;
}

export function transferId(n: number): TransferId {
  return keccak256(toHex(`transfer-${n}`));
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
