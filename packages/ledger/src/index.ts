/**
 * @twinledger/ledger — Host chain runtime and fungible token ledger.
 *
 * Provides the execution environment contracts run in:
 * - Chain: chain id, clock, address allocation, atomic calls
 * - Undo journal containers for contract state
 * - Reentrancy guard
 * - TokenLedger: balances, allowances, supply, receive hooks
 *
 * Design rules:
 * - All amounts are bigint base units
 * - A failed call leaves no state change and no event
 * - Events reach the store only when the outermost call commits
 */

// Runtime
export { Chain } from "./chain.js";
export { JournaledMap, JournaledCell, noTransaction } from "./journal.js";
export type { Journal, Undo } from "./journal.js";
export { ReentrancyGuard } from "./reentrancy.js";

// Token
export { TokenLedger, FixedSupplyToken, normalizeAddress } from "./token-ledger.js";

// Types
export type {
  Clock,
  ChainConfig,
  TokenConfig,
  ReceiveHook,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";
