import dotenv from "dotenv";

dotenv.config();

export const RPC_URL =
  process.env.SOLANA_RPC_URL?.trim() || "https://api.testnet.solana.com";

export const CUSTODY_KEYPAIR_PATH =
  process.env.CUSTODY_KEYPAIR_PATH?.trim() || ".keys/id.json";
