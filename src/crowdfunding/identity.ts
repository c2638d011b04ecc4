import { PublicKey, SystemProgram } from "@solana/web3.js";
import type { PublicKeyLike } from "./types.js";

/** All-zero key; plays the role of the null address. */
export const NULL_IDENTITY: PublicKeyLike = SystemProgram.programId.toBase58();

export function isValidIdentity(value: string): boolean {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * A payout recipient must be a well-formed public key other than the null
 * address.
 */
export function isValidRecipient(value: PublicKeyLike | null): value is PublicKeyLike {
  if (value === null || value.length === 0) return false;
  if (!isValidIdentity(value)) return false;
  return value !== NULL_IDENTITY;
}
