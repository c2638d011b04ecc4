export * from "./crowdfunding/index.js";
export { SolanaTransferRail } from "./solana/transfer-rail.js";
export { MAX_LAMPORTS } from "./solana/transfer-rail.js";
export type { PayoutConnection, PayoutSimulation, SolanaTransferRailOptions } from "./solana/transfer-rail.js";
export { DEFAULT_KEYPAIR_PATH, loadKeypair, writeNewKeypair } from "./solana/keypair.js";
export { ConfigError, loadConfig } from "./config.js";
export type { LedgerConfig } from "./config.js";
export { buildLedger } from "./app.js";
export type { LedgerDependencies } from "./app.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
