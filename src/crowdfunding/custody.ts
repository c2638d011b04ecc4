import { v4 as uuidv4 } from "uuid";
import { assertAmount, checkedAdd } from "./amount.js";
import type { Amount, PublicKeyLike, TransferRequest, TransferResult, ValueTransferRail } from "./types.js";

export interface PayoutRecord {
  reference: string;
  recipient: PublicKeyLike;
  amount: Amount;
  campaignIndex: number;
}

/**
 * Process-local custody account. The boundary layer deposits donated value
 * here before calling donate; settlements pay out of it.
 */
export class InMemoryCustody implements ValueTransferRail {
  private held: Amount = 0n;
  private readonly deposits = new Map<PublicKeyLike, Amount>();
  private readonly payouts: PayoutRecord[] = [];
  private pendingFailure: string | null = null;

  deposit(from: PublicKeyLike, amount: Amount): void {
    assertAmount(amount, "Deposit");
    this.held = checkedAdd(this.held, amount);
    this.deposits.set(from, checkedAdd(this.deposits.get(from) ?? 0n, amount));
  }

  /** Makes the next transfer report failure with the given reason. */
  failNextTransfer(reason = "Transfer rejected by custody"): void {
    this.pendingFailure = reason;
  }

  async transfer(request: TransferRequest): Promise<TransferResult> {
    if (request.signal?.aborted) {
      return { status: "failed", reason: "cancelled before sending" };
    }
    if (this.pendingFailure !== null) {
      const reason = this.pendingFailure;
      this.pendingFailure = null;
      return { status: "failed", reason };
    }
    if (request.amount > this.held) {
      return {
        status: "failed",
        reason: `Insufficient custody balance: holding ${this.held}, asked for ${request.amount}`
      };
    }

    this.held -= request.amount;
    const record: PayoutRecord = {
      reference: uuidv4(),
      recipient: request.recipient,
      amount: request.amount,
      campaignIndex: request.campaignIndex
    };
    this.payouts.push(record);
    return { status: "confirmed", reference: record.reference };
  }

  getHeld(): Amount {
    return this.held;
  }

  getDeposited(from: PublicKeyLike): Amount {
    return this.deposits.get(from) ?? 0n;
  }

  getPayouts(): PayoutRecord[] {
    return this.payouts.map((p) => ({ ...p }));
  }

  getPaidTo(recipient: PublicKeyLike): Amount {
    let total = 0n;
    for (const payout of this.payouts) {
      if (payout.recipient === recipient) total += payout.amount;
    }
    return total;
  }
}
