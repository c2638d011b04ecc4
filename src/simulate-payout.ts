import { Connection } from "@solana/web3.js";
import { formatSol, parseAmount } from "./crowdfunding/amount.js";
import { CUSTODY_KEYPAIR_PATH, RPC_URL } from "./env.js";
import { loadKeypair } from "./solana/keypair.js";
import { SolanaTransferRail } from "./solana/transfer-rail.js";

function getArg(name: string): string {
  const arg = process.argv.find((a) => a.startsWith(`--${name}=`));
  const value = arg?.slice(name.length + 3);
  if (!value) {
    throw new Error(`Missing --${name}. Usage: npm run simulate-payout -- --to=<address> --lamports=<amount>`);
  }
  return value;
}

async function main() {
  const recipient = getArg("to");
  const lamports = parseAmount(getArg("lamports"));
  const custody = await loadKeypair(CUSTODY_KEYPAIR_PATH);
  const rail = new SolanaTransferRail(new Connection(RPC_URL, "confirmed"), custody);

  console.log("RPC URL:", RPC_URL);
  console.log("Custody address:", rail.getCustodyAddress());
  console.log("Recipient:", recipient);
  console.log("Amount (SOL):", formatSol(lamports));

  const report = await rail.simulatePayout(recipient, lamports);

  console.log("Simulate err:", report.error);
  if (report.logs.length > 0) {
    console.log("Logs:");
    for (const line of report.logs) console.log(line);
  }
  if (report.unitsConsumed !== null) {
    console.log("Units consumed:", report.unitsConsumed);
  }
  if (!report.ok) process.exitCode = 1;
}

main().catch((err: unknown) => {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    console.error(`Missing ${CUSTODY_KEYPAIR_PATH}. Run: npm run gen-keypair (then fund it)`);
  } else {
    console.error("Payout simulation failed:", err);
  }
  process.exit(1);
});
