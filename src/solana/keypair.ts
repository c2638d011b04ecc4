import { Keypair } from "@solana/web3.js";
import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export const DEFAULT_KEYPAIR_PATH = ".keys/id.json";

export async function loadKeypair(path = DEFAULT_KEYPAIR_PATH): Promise<Keypair> {
  const raw = await readFile(path, "utf8");
  const secret: unknown = JSON.parse(raw);
  if (!Array.isArray(secret) || !secret.every((n) => Number.isInteger(n) && n >= 0 && n <= 255)) {
    throw new Error(`Invalid keypair file at ${path} (expected JSON array of bytes)`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(secret));
}

/** Writes a fresh keypair; refuses to overwrite an existing file. */
export async function writeNewKeypair(path = DEFAULT_KEYPAIR_PATH): Promise<Keypair> {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }

  const keypair = Keypair.generate();
  const secret = Array.from(keypair.secretKey);
  await writeFile(path, JSON.stringify(secret), { encoding: "utf8", flag: "wx" });
  return keypair;
}
