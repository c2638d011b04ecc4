import { Connection } from "@solana/web3.js";
import { formatSol } from "./crowdfunding/amount.js";
import { CUSTODY_KEYPAIR_PATH, RPC_URL } from "./env.js";
import { loadKeypair } from "./solana/keypair.js";

async function main() {
  const custody = await loadKeypair(CUSTODY_KEYPAIR_PATH);
  const connection = new Connection(RPC_URL, "confirmed");

  const [lamports, slot] = await Promise.all([
    connection.getBalance(custody.publicKey, "confirmed"),
    connection.getSlot("confirmed")
  ]);

  console.log("RPC URL:", RPC_URL);
  console.log("Slot:", slot);
  console.log("Custody address:", custody.publicKey.toBase58());
  console.log("Balance (lamports):", lamports);
  console.log("Balance (SOL):", formatSol(BigInt(lamports)));
}

main().catch((err: unknown) => {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    console.error(`Missing ${CUSTODY_KEYPAIR_PATH}. Run: npm run gen-keypair (then fund it)`);
  } else {
    console.error("Balance check failed:", err);
  }
  process.exit(1);
});
