import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { parseAmount } from "./amount.js";
import { LedgerError } from "./errors.js";
import { Ledger } from "./ledger.js";
import type { LedgerOptions } from "./ledger.js";
import type { Campaign } from "./types.js";

const SNAPSHOT_VERSION = 1;

const amountString = z
  .string()
  .regex(/^\d+$/, "Amounts are stored as decimal strings")
  .transform((text) => parseAmount(text));

const campaignSchema = z.object({
  index: z.number().int().nonnegative(),
  creator: z.string().min(1),
  name: z.string(),
  description: z.string(),
  benefactor: z.string().min(1).nullable(),
  goal: amountString,
  deadline: z.number().int().safe(),
  amountRaised: amountString,
  ended: z.boolean()
}).refine((c) => !c.ended || c.amountRaised === 0n, {
  message: "A settled campaign must hold a zero balance",
  path: ["amountRaised"]
});

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  campaigns: z.array(campaignSchema)
});

export interface StoredCampaign extends Omit<Campaign, "goal" | "amountRaised"> {
  goal: string;
  amountRaised: string;
}

/** The whole durable state: the campaign sequence in creation order. */
export interface LedgerSnapshot {
  version: typeof SNAPSHOT_VERSION;
  campaigns: StoredCampaign[];
}

export function toSnapshot(ledger: Ledger): LedgerSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    campaigns: ledger.listCampaigns().map((c) => ({
      ...c,
      goal: c.goal.toString(),
      amountRaised: c.amountRaised.toString()
    }))
  };
}

export function parseSnapshot(raw: unknown): Campaign[] {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new LedgerError("InvalidArgument", `Invalid ledger snapshot${where}: ${issue?.message ?? "unknown error"}`);
  }
  return parsed.data.campaigns;
}

export function restoreLedger(raw: unknown, options: LedgerOptions): Ledger {
  return new Ledger(options, parseSnapshot(raw));
}

export async function saveSnapshot(ledger: Ledger, path: string): Promise<void> {
  await writeFile(path, JSON.stringify(toSnapshot(ledger), null, 2), "utf8");
}

export async function loadSnapshot(path: string, options: LedgerOptions): Promise<Ledger> {
  const content = await readFile(path, "utf8");
  return restoreLedger(JSON.parse(content), options);
}
