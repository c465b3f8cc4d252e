/**
 * Signer Registry
 *
 * Exactly SIGNER_COUNT distinct, non-zero signers plus one administrator.
 * The administrator is fixed at construction and may coincide with a
 * signer. Signers change only by in-place slot replacement.
 */

import type { Address } from "@twinledger/types";
import { ZERO_ADDRESS } from "@twinledger/types";
import type { Journal } from "@twinledger/ledger";
import { JournaledCell, normalizeAddress } from "@twinledger/ledger";
import { GovernanceError, SIGNER_COUNT } from "./types.js";

export class SignerRegistry {
  readonly administrator: Address;
  private readonly _slots: JournaledCell<readonly Address[]>;

  constructor(journal: Journal, signers: readonly string[], administrator: string) {
    if (signers.length !== SIGNER_COUNT) {
      throw new GovernanceError(
        "INVALID_SIGNER_SET",
        `Expected exactly ${SIGNER_COUNT} signers, got ${signers.length}`,
      );
    }

    const slots = signers.map((s) => toIdentity(s, "INVALID_SIGNER_SET"));
    if (slots.includes(ZERO_ADDRESS)) {
      throw new GovernanceError("INVALID_SIGNER_SET", "Signer cannot be the zero address");
    }
    if (new Set(slots).size !== slots.length) {
      throw new GovernanceError("INVALID_SIGNER_SET", "Signers must be distinct");
    }

    this.administrator = toIdentity(administrator, "INVALID_SIGNER_SET");
    if (this.administrator === ZERO_ADDRESS) {
      throw new GovernanceError("INVALID_SIGNER_SET", "Administrator cannot be the zero address");
    }
    this._slots = new JournaledCell<readonly Address[]>(journal, slots);
  }

  /** Registered signers in slot order. */
  get signers(): readonly Address[] {
    return this._slots.value;
  }

  isSigner(identity: Address): boolean {
    for (const slot of this._slots.value) {
      if (slot === identity) return true;
    }
    return false;
  }

  isSignerOrAdministrator(identity: Address): boolean {
    return identity === this.administrator || this.isSigner(identity);
  }

  /**
   * Put `newSigner` into `oldSigner`'s slot.
   */
  replace(oldSigner: Address, newSigner: Address): void {
    const slots = this._slots.value;
    const index = slots.indexOf(oldSigner);
    if (index === -1) {
      throw new GovernanceError("INVALID_SIGNER_UPDATE", `Old signer is not registered: ${oldSigner}`);
    }
    if (newSigner === ZERO_ADDRESS) {
      throw new GovernanceError("INVALID_SIGNER_UPDATE", "New signer cannot be the zero address");
    }
    if (this.isSigner(newSigner)) {
      throw new GovernanceError("INVALID_SIGNER_UPDATE", `New signer is already registered: ${newSigner}`);
    }

    this._slots.set(slots.map((s, i) => (i === index ? newSigner : s)));
  }
}

/**
 * Normalize an identity, reporting malformed input under `code`.
 */
export function toIdentity(
  value: string,
  code: "INVALID_SIGNER_SET" | "NOT_AUTHORIZED" | "NOT_A_SIGNER" | "INVALID_PAYLOAD",
): Address {
  try {
    return normalizeAddress(value);
  } catch (err) {
    throw new GovernanceError(code, `Invalid identity: ${value}`, { cause: err });
  }
}
