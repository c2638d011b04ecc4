import { CUSTODY_KEYPAIR_PATH } from "./env.js";
import { writeNewKeypair } from "./solana/keypair.js";

async function main() {
  const keypair = await writeNewKeypair(CUSTODY_KEYPAIR_PATH);

  console.log("Wrote custody keypair:", CUSTODY_KEYPAIR_PATH);
  console.log("Custody address:", keypair.publicKey.toBase58());
}

main().catch((err: unknown) => {
  if (err instanceof Error && "code" in err && err.code === "EEXIST") {
    console.error(`Keypair already exists at ${CUSTODY_KEYPAIR_PATH} (delete it to regenerate)`);
    process.exit(2);
  }
  console.error("Keypair generation failed:", err);
  process.exit(1);
});
