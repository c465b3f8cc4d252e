/**
 * Operation Fingerprints and Signatures
 *
 * Deterministic, chain-tagged digests over an operation's fields.
 *
 * Design:
 * - ABI encoding + keccak-256 (viem), so digests match what an EVM
 *   signer tool computes for the same fields
 * - The chain tag is part of both digests: an approval collected on one
 *   deployment never verifies on a sibling deployment
 * - Signatures are EIP-191 personal messages over the 32 raw digest bytes
 */

import { encodeAbiParameters, keccak256, recoverMessageAddress } from "viem";
import type { LocalAccount } from "viem/accounts";
import type { Address, ChainTag, Hex } from "@twinledger/types";
import { isHex } from "@twinledger/types";
import { GovernanceError } from "./types.js";

// =============================================================================
// Digests
// =============================================================================

export interface OperationFields {
  readonly sequence: bigint;
  readonly operationType: number;
  readonly target: Address;
  readonly value: bigint;
  readonly data: Hex;
  readonly chainTag: ChainTag;
}

/**
 * Operation identifier:
 * keccak256(abi.encode(sequence, type, target, value, data, chainTag)).
 */
export function computeOperationId(fields: OperationFields): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { type: "uint256" },
        { type: "uint8" },
        { type: "address" },
        { type: "uint256" },
        { type: "bytes" },
        { type: "uint256" },
      ],
      [
        fields.sequence,
        fields.operationType,
        fields.target,
        fields.value,
        fields.data,
        fields.chainTag,
      ],
    ),
  );
}

/**
 * Digest signers sign:
 * keccak256(abi.encode(chainTag, operationId, type, target, value, keccak256(data))).
 */
export function computeOperationHash(operationId: Hex, fields: OperationFields): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { type: "uint256" },
        { type: "bytes32" },
        { type: "uint8" },
        { type: "address" },
        { type: "uint256" },
        { type: "bytes32" },
      ],
      [
        fields.chainTag,
        operationId,
        fields.operationType,
        fields.target,
        fields.value,
        keccak256(fields.data),
      ],
    ),
  );
}

// =============================================================================
// Signatures
// =============================================================================

/**
 * Recover the identity that signed `hash`.
 *
 * @throws GovernanceError (INVALID_SIGNATURE) if the signature is malformed
 */
export async function recoverSigner(hash: Hex, signature: string): Promise<Address> {
  if (!isHex(signature)) {
    throw new GovernanceError("INVALID_SIGNATURE", "Signature must be 0x-prefixed hex");
  }
  try {
    return await recoverMessageAddress({ message: { raw: hash }, signature });
  } catch (err) {
    throw new GovernanceError("INVALID_SIGNATURE", "Signature could not be recovered", {
      cause: err,
    });
  }
}

/**
 * Sign an operation hash the way `recoverSigner` expects.
 */
export function signOperationHash(account: LocalAccount, hash: Hex): Promise<Hex> {
  return account.signMessage({ message: { raw: hash } });
}
