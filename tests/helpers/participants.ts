import { Keypair } from "@solana/web3.js";
import type { PublicKeyLike } from "../../src/crowdfunding/types.js";

export function makeKeypair(seedOffset: number): Keypair {
  const seed = new Uint8Array(32);
  seed[0] = seedOffset;
  return Keypair.fromSeed(seed);
}

export function pubkey(k: Keypair): PublicKeyLike {
  return k.publicKey.toBase58();
}

/** Deterministic identity for a participant number. */
export function identity(seedOffset: number): PublicKeyLike {
  return pubkey(makeKeypair(seedOffset));
}
