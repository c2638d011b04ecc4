export type PublicKeyLike = string;

/** Unsigned amount in the smallest currency unit (lamports on Solana). */
export type Amount = bigint;

export interface Clock {
  /** Current time in unix seconds. */
  now(): number;
}

export type AuthorizationPolicy = "open" | "owner_only" | "allowlist";

export interface AuthorizationConfig {
  /** The ledger's designated authority (owner). */
  authority: PublicKeyLike;
  createPolicy: AuthorizationPolicy;
  endPolicy: AuthorizationPolicy;
  /** Extra identities admitted under the "allowlist" policy. */
  allowlist: PublicKeyLike[];
}

export interface Campaign {
  /** Position in the ledger, assigned in creation order and never reused */
  index: number;
  creator: PublicKeyLike;
  name: string;
  description: string;
  /** Recipient of the payout; null when the campaign was registered without one */
  benefactor: PublicKeyLike | null;
  /** Informational target, never enforced */
  goal: Amount;
  /** Unix seconds after which donations are rejected and settlement is allowed */
  deadline: number;
  amountRaised: Amount;
  /** True once the payout has been issued */
  ended: boolean;
}

export type CampaignState = "open" | "awaiting_settlement" | "settled";

export interface CreateCampaignInput {
  name: string;
  description: string;
  benefactor: PublicKeyLike | null;
  goal: Amount;
  /** Seconds from now until the deadline */
  duration: number;
}

export interface TransferRequest {
  recipient: PublicKeyLike;
  amount: Amount;
  campaignIndex: number;
  /**
   * Aborted when the caller stops waiting. A rail must not start moving funds
   * once it is aborted, and must settle promptly.
   */
  signal?: AbortSignal;
}

export type TransferResult =
  | { status: "confirmed"; reference: string }
  | { status: "failed"; reason: string };

/**
 * Payment rail holding donated funds in custody and paying out settlements.
 * A transfer either resolves with a result or rejects; only a "confirmed"
 * result means funds moved, and any other outcome means they did not.
 */
export interface ValueTransferRail {
  transfer(request: TransferRequest): Promise<TransferResult>;
}

export interface SettlementReceipt {
  index: number;
  benefactor: PublicKeyLike;
  amount: Amount;
  reference: string;
}
