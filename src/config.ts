import "./env.js";
import { z } from "zod";
import { DEFAULT_CREATE_POLICY, DEFAULT_END_POLICY } from "./crowdfunding/authorization.js";
import { isValidIdentity } from "./crowdfunding/identity.js";
import { DEFAULT_TRANSFER_TIMEOUT_MS } from "./crowdfunding/ledger.js";
import type { AuthorizationConfig } from "./crowdfunding/types.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface LedgerConfig {
  rpcUrl: string;
  custodyKeypairPath: string;
  authorization: AuthorizationConfig;
  transferTimeoutMs: number;
  logLevel: string;
}

const identity = z.string().trim().refine(isValidIdentity, "must be a base58 public key");

const policy = z.enum(["open", "owner_only", "allowlist"]);

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  SOLANA_RPC_URL: z.preprocess(blankToUndefined, z.string().trim().url().default("https://api.testnet.solana.com")),
  CUSTODY_KEYPAIR_PATH: z.preprocess(blankToUndefined, z.string().trim().default(".keys/id.json")),
  LEDGER_AUTHORITY: identity,
  LEDGER_CREATE_POLICY: z.preprocess(blankToUndefined, policy.default(DEFAULT_CREATE_POLICY)),
  LEDGER_END_POLICY: z.preprocess(blankToUndefined, policy.default(DEFAULT_END_POLICY)),
  LEDGER_ALLOWLIST: z.preprocess(
    blankToUndefined,
    z
      .string()
      .default("")
      .transform((list) =>
        list
          .split(",")
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0)
      )
      .pipe(z.array(identity))
  ),
  TRANSFER_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_TRANSFER_TIMEOUT_MS)
  ),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  )
});

export function loadConfig(env: Record<string, string | undefined> = process.env): LedgerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ledger configuration (${details})`);
  }

  const values = parsed.data;
  return {
    rpcUrl: values.SOLANA_RPC_URL,
    custodyKeypairPath: values.CUSTODY_KEYPAIR_PATH,
    authorization: {
      authority: values.LEDGER_AUTHORITY,
      createPolicy: values.LEDGER_CREATE_POLICY,
      endPolicy: values.LEDGER_END_POLICY,
      allowlist: values.LEDGER_ALLOWLIST
    },
    transferTimeoutMs: values.TRANSFER_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL
  };
}
