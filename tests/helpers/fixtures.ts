import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

export async function loadSeed(): Promise<Uint8Array> {
  const raw = await readFile(fixturePath("seed.json"), "utf8");
  const data: unknown = JSON.parse(raw);

  if (!Array.isArray(data) || data.length !== 32) {
    throw new Error("Invalid seed fixture (expected array of 32 numbers)");
  }

  return Uint8Array.from(data);
}
