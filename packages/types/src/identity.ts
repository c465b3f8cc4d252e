/**
 * Identity and Chain Types
 *
 * Identities are 20-byte EVM-style addresses. Digests, payloads and
 * transfer identifiers are 0x-prefixed hex strings. Both shapes are
 * structurally identical to viem's `Address` / `Hex`, so values flow
 * between the two without conversion.
 *
 * Rules:
 * - Addresses compare in checksummed form (normalize before storing)
 * - The zero address is never a valid signer, recipient or target
 * - Chain tags are numeric chain ids (bigint)
 */

/**
 * A 20-byte account identity (e.g. "0x52908400098527886E0F7030069857D2E4169EE7").
 */
export type Address = `0x${string}`;

/**
 * Arbitrary 0x-prefixed hex bytes.
 */
export type Hex = `0x${string}`;

/**
 * Chain identifier used to domain-separate deployments of the same code.
 */
export type ChainTag = bigint;

/**
 * Externally supplied identifier of an inbound settlement (32 bytes),
 * assumed globally unique per source-chain outbound event.
 */
export type TransferId = Hex;

/**
 * Amount in base units (no decimals applied).
 */
export type Amount = bigint;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * The "not supplied" value for optional chain tags on bridge calls.
 */
export const DEFAULT_CHAIN_TAG: ChainTag = 0n;
