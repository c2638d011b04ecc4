import { assertAmount, checkedAdd } from "./amount.js";
import { Authorizer } from "./authorization.js";
import { LedgerError } from "./errors.js";
import { isValidRecipient } from "./identity.js";
import { dispatch, makeEvent } from "./notifications.js";
import type { LedgerEventPayload, NotificationSink } from "./notifications.js";
import { SettlementGuard } from "./settlement-guard.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type {
  Amount,
  AuthorizationConfig,
  Campaign,
  CampaignState,
  Clock,
  CreateCampaignInput,
  PublicKeyLike,
  SettlementReceipt,
  TransferRequest,
  TransferResult,
  ValueTransferRail
} from "./types.js";

export const DEFAULT_TRANSFER_TIMEOUT_MS = 60_000;

export interface LedgerOptions {
  clock: Clock;
  rail: ValueTransferRail;
  authorization: AuthorizationConfig;
  notifications?: NotificationSink;
  logger?: Logger;
  /**
   * How long a payout may run before the rail is asked to abort. The ledger
   * still waits for the rail's own answer after that.
   */
  transferTimeoutMs?: number;
}

/**
 * Ordered, append-only collection of campaigns.
 *
 * create and donate run to completion synchronously. end awaits the payout
 * rail, so it applies its effects before the first await (ended set, balance
 * zeroed) and holds the ledger-wide settlement guard until the rail answers,
 * even past the transfer timeout. Any failure restores the campaign exactly
 * as it was.
 */
export class Ledger {
  private readonly campaigns: Campaign[] = [];
  private readonly byCreator = new Map<PublicKeyLike, number[]>();
  private readonly clock: Clock;
  private readonly rail: ValueTransferRail;
  private readonly authorizer: Authorizer;
  private readonly notifications: NotificationSink | null;
  private readonly logger: Logger;
  private readonly transferTimeoutMs: number;
  private readonly settlementGuard = new SettlementGuard();

  constructor(options: LedgerOptions, initial: readonly Campaign[] = []) {
    const timeout = options.transferTimeoutMs ?? DEFAULT_TRANSFER_TIMEOUT_MS;
    if (!Number.isSafeInteger(timeout) || timeout <= 0) {
      throw new LedgerError("InvalidArgument", "transferTimeoutMs must be a positive integer");
    }
    this.clock = options.clock;
    this.rail = options.rail;
    this.authorizer = new Authorizer(options.authorization);
    this.notifications = options.notifications ?? null;
    this.logger = options.logger ?? silentLogger;
    this.transferTimeoutMs = timeout;

    initial.forEach((campaign, position) => {
      if (campaign.index !== position) {
        throw new LedgerError(
          "InvalidIndex",
          `Campaign at position ${position} carries index ${campaign.index}`
        );
      }
      this.append({ ...campaign });
    });
  }

  getAuthority(): PublicKeyLike {
    return this.authorizer.getAuthority();
  }

  create(caller: PublicKeyLike, input: CreateCampaignInput): number {
    if (!this.authorizer.isAuthorized("create", caller)) {
      throw new LedgerError("NotAuthorized", "Caller is not allowed to create campaigns");
    }
    const goal = assertAmount(input.goal, "Goal");
    if (!Number.isSafeInteger(input.duration) || input.duration < 0) {
      throw new LedgerError("InvalidArgument", "Duration must be a non-negative whole number of seconds");
    }

    const now = this.clock.now();
    const deadline = now + input.duration;
    if (!Number.isSafeInteger(deadline)) {
      throw new LedgerError("InvalidArgument", "Deadline is out of range");
    }

    const campaign: Campaign = {
      index: this.campaigns.length,
      creator: caller,
      name: input.name,
      description: input.description,
      benefactor: input.benefactor,
      goal,
      deadline,
      amountRaised: 0n,
      ended: false
    };
    this.append(campaign);

    this.logger.info({ index: campaign.index, creator: caller, deadline }, "Campaign created");
    this.emit({ type: "CampaignCreated", caller, campaign: { ...campaign } }, now);
    return campaign.index;
  }

  donate(caller: PublicKeyLike, index: number, value: Amount): void {
    const campaign = this.requireCampaign(index);
    const now = this.clock.now();
    if (now >= campaign.deadline) {
      throw new LedgerError("CampaignClosed", `Campaign ${index} stopped accepting donations at ${campaign.deadline}`);
    }
    if (campaign.ended) {
      throw new LedgerError("CampaignAlreadySettled", `Campaign ${index} has already been settled`);
    }
    assertAmount(value, "Donation");

    campaign.amountRaised = checkedAdd(campaign.amountRaised, value);

    this.logger.info({ index, caller, value, amountRaised: campaign.amountRaised }, "Donation recorded");
    this.emit({ type: "Donation", caller, value, index }, now);
  }

  async end(caller: PublicKeyLike, index: number): Promise<SettlementReceipt> {
    const campaign = this.requireCampaign(index);
    if (!this.authorizer.isAuthorized("end", caller)) {
      throw new LedgerError("NotAuthorized", "Caller is not allowed to settle campaigns");
    }
    if (this.clock.now() < campaign.deadline) {
      throw new LedgerError("CampaignStillOpen", `Campaign ${index} is open until ${campaign.deadline}`);
    }
    if (campaign.ended) {
      throw new LedgerError("CampaignAlreadySettled", `Campaign ${index} has already been settled`);
    }
    const benefactor = campaign.benefactor;
    if (!isValidRecipient(benefactor)) {
      throw new LedgerError("NoBenefactor", `Campaign ${index} has no valid benefactor`);
    }
    if (campaign.amountRaised === 0n) {
      throw new LedgerError("NothingToSettle", `Campaign ${index} has raised nothing`);
    }
    const release = this.settlementGuard.tryAcquire();
    if (!release) {
      this.logger.warn({ index, caller }, "Settlement rejected: another settlement is in flight");
      throw new LedgerError("ReentrantCall", "A settlement is already in progress");
    }

    try {
      campaign.ended = true;
      const amount = campaign.amountRaised;
      campaign.amountRaised = 0n;
      const rollback = () => {
        campaign.ended = false;
        campaign.amountRaised = amount;
      };

      let result: TransferResult;
      try {
        result = await this.transferWithTimeout({ recipient: benefactor, amount, campaignIndex: index });
      } catch (err) {
        rollback();
        this.logger.warn({ index, benefactor, amount, err }, "Payout transfer threw; settlement rolled back");
        throw new LedgerError("TransferFailed", `Payout for campaign ${index} failed`, { cause: err });
      }
      if (result.status === "failed") {
        rollback();
        this.logger.warn({ index, benefactor, amount, reason: result.reason }, "Payout transfer failed; settlement rolled back");
        throw new LedgerError("TransferFailed", `Payout for campaign ${index} failed: ${result.reason}`);
      }

      this.logger.info({ index, benefactor, amount, reference: result.reference }, "Campaign settled");
      this.emit({ type: "CampaignEnded", index, benefactor, amount }, this.clock.now());
      return { index, benefactor, amount, reference: result.reference };
    } finally {
      release();
    }
  }

  campaignCount(): number {
    return this.campaigns.length;
  }

  campaignAt(index: number): Campaign {
    return { ...this.requireCampaign(index) };
  }

  balanceOf(index: number): Amount {
    return this.requireCampaign(index).amountRaised;
  }

  campaignState(index: number): CampaignState {
    const campaign = this.requireCampaign(index);
    if (campaign.ended) return "settled";
    return this.clock.now() < campaign.deadline ? "open" : "awaiting_settlement";
  }

  /** Campaigns registered by `creator`, in creation order. */
  campaignsByCreator(creator: PublicKeyLike): Campaign[] {
    const indices = this.byCreator.get(creator) ?? [];
    return indices.map((i) => ({ ...this.campaigns[i] }));
  }

  listCampaigns(): Campaign[] {
    return this.campaigns.map((c) => ({ ...c }));
  }

  isSettling(): boolean {
    return this.settlementGuard.isHeld();
  }

  private append(campaign: Campaign): void {
    this.campaigns.push(campaign);
    const indices = this.byCreator.get(campaign.creator);
    if (indices) {
      indices.push(campaign.index);
    } else {
      this.byCreator.set(campaign.creator, [campaign.index]);
    }
  }

  private requireCampaign(index: number): Campaign {
    const campaign = Number.isInteger(index) && index >= 0 ? this.campaigns[index] : undefined;
    if (!campaign) {
      throw new LedgerError("InvalidIndex", `No campaign at index ${index} (count: ${this.campaigns.length})`);
    }
    return campaign;
  }

  /**
   * Past the timeout the rail is aborted, but its answer is still awaited:
   * a transfer already under way may yet land, and until it settles the
   * campaign stays settled-in-progress and the guard stays held.
   */
  private async transferWithTimeout(request: TransferRequest): Promise<TransferResult> {
    const controller = new AbortController();
    const pending = this.rail.transfer({ ...request, signal: controller.signal });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.transferTimeoutMs);
    });
    try {
      const first = await Promise.race([pending, timeout]);
      if (first !== "timeout") return first;
    } finally {
      clearTimeout(timer);
    }

    const reason = `Transfer timed out after ${this.transferTimeoutMs} ms`;
    controller.abort(new Error(reason));
    this.logger.warn(
      { index: request.campaignIndex, amount: request.amount },
      "Payout exceeded its timeout; waiting for the rail to settle"
    );
    const late = await pending;
    if (late.status === "confirmed") return late;
    return { status: "failed", reason: `${reason}: ${late.reason}` };
  }

  private emit(payload: LedgerEventPayload, at: number): void {
    if (!this.notifications) return;
    dispatch(this.notifications, makeEvent(payload, at), this.logger);
  }
}
