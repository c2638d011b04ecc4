import { setTimeout as delay } from "node:timers/promises";
import {
  Keypair,
  PublicKey,
  SystemProgram,
  Transaction,
  TransactionExpiredBlockheightExceededError
} from "@solana/web3.js";
import type {
  BlockhashWithExpiryBlockHeight,
  BlockheightBasedTransactionConfirmationStrategy,
  Commitment,
  RpcResponseAndContext,
  SendOptions,
  SignatureResult,
  SignatureStatus,
  SignatureStatusConfig,
  SimulatedTransactionResponse,
  TransactionSignature
} from "@solana/web3.js";
import { LedgerError } from "../crowdfunding/errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { Amount, PublicKeyLike, TransferRequest, TransferResult, ValueTransferRail } from "../crowdfunding/types.js";

/** A system transfer carries lamports as a u64. */
export const MAX_LAMPORTS: Amount = (1n << 64n) - 1n;

const DEFAULT_POLL_INTERVAL_MS = 2_000;

/** The slice of `Connection` a payout needs. */
export interface PayoutConnection {
  getLatestBlockhash(commitment?: Commitment): Promise<BlockhashWithExpiryBlockHeight>;
  getBlockHeight(commitment?: Commitment): Promise<number>;
  simulateTransaction(transaction: Transaction): Promise<RpcResponseAndContext<SimulatedTransactionResponse>>;
  sendRawTransaction(rawTransaction: Buffer | Uint8Array | number[], options?: SendOptions): Promise<TransactionSignature>;
  confirmTransaction(
    strategy: BlockheightBasedTransactionConfirmationStrategy,
    commitment?: Commitment
  ): Promise<RpcResponseAndContext<SignatureResult>>;
  getSignatureStatus(
    signature: TransactionSignature,
    config?: SignatureStatusConfig
  ): Promise<RpcResponseAndContext<SignatureStatus | null>>;
}

export interface SolanaTransferRailOptions {
  commitment?: Commitment;
  /** Delay between status checks when confirmation has to be polled */
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface PayoutSimulation {
  ok: boolean;
  error: string | null;
  logs: string[];
  unitsConsumed: number | null;
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function outOfRange(lamports: Amount): string | null {
  if (lamports < 0n || lamports > MAX_LAMPORTS) {
    return `Payout of ${lamports} lamports is outside the u64 range of a system transfer`;
  }
  return null;
}

/**
 * Pays settlements out of a custody keypair with a system transfer.
 *
 * Once a transaction has been sent, transfer does not return until it is
 * confirmed, has failed on chain, or its blockhash has expired, whatever the
 * abort signal says. An abort only stops a transfer that has not been sent.
 */
export class SolanaTransferRail implements ValueTransferRail {
  private readonly connection: PayoutConnection;
  private readonly custody: Keypair;
  private readonly commitment: Commitment;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  constructor(connection: PayoutConnection, custody: Keypair, options: SolanaTransferRailOptions = {}) {
    this.connection = connection;
    this.custody = custody;
    this.commitment = options.commitment ?? "confirmed";
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? silentLogger;
  }

  getCustodyAddress(): PublicKeyLike {
    return this.custody.publicKey.toBase58();
  }

  buildPayoutTransaction(recipient: PublicKeyLike, lamports: Amount, recentBlockhash?: string): Transaction {
    const problem = outOfRange(lamports);
    if (problem) throw new LedgerError("InvalidArgument", problem);

    const tx = new Transaction({ feePayer: this.custody.publicKey });
    if (recentBlockhash) tx.recentBlockhash = recentBlockhash;
    return tx.add(
      SystemProgram.transfer({
        fromPubkey: this.custody.publicKey,
        toPubkey: new PublicKey(recipient),
        lamports
      })
    );
  }

  /** Dry run of a payout against the cluster. Nothing lands. */
  async simulatePayout(recipient: PublicKeyLike, lamports: Amount): Promise<PayoutSimulation> {
    const latest = await this.connection.getLatestBlockhash(this.commitment);
    const tx = this.buildPayoutTransaction(recipient, lamports, latest.blockhash);
    tx.sign(this.custody);

    const sim = await this.connection.simulateTransaction(tx);
    return {
      ok: sim.value.err === null,
      error: sim.value.err === null ? null : JSON.stringify(sim.value.err),
      logs: sim.value.logs ?? [],
      unitsConsumed: sim.value.unitsConsumed ?? null
    };
  }

  async transfer(request: TransferRequest): Promise<TransferResult> {
    const { recipient, amount, campaignIndex, signal } = request;
    const problem = outOfRange(amount);
    if (problem) return { status: "failed", reason: problem };
    if (signal?.aborted) return { status: "failed", reason: "cancelled before sending" };

    let latest: BlockhashWithExpiryBlockHeight;
    try {
      latest = await this.connection.getLatestBlockhash(this.commitment);
    } catch (err) {
      return { status: "failed", reason: reasonOf(err) };
    }
    if (signal?.aborted) return { status: "failed", reason: "cancelled before sending" };

    const tx = this.buildPayoutTransaction(recipient, amount, latest.blockhash);
    tx.lastValidBlockHeight = latest.lastValidBlockHeight;
    tx.sign(this.custody);

    let signature: TransactionSignature;
    try {
      signature = await this.connection.sendRawTransaction(tx.serialize(), {
        preflightCommitment: this.commitment
      });
    } catch (err) {
      return { status: "failed", reason: reasonOf(err) };
    }
    this.logger.info({ campaignIndex, signature }, "Payout sent");

    const result = await this.confirm(signature, latest);
    if (result.status === "confirmed") {
      this.logger.info({ campaignIndex, signature }, "Payout confirmed");
    } else {
      this.logger.warn({ campaignIndex, signature, reason: result.reason }, "Payout did not land");
    }
    return result;
  }

  private async confirm(signature: TransactionSignature, latest: BlockhashWithExpiryBlockHeight): Promise<TransferResult> {
    try {
      const { value } = await this.connection.confirmTransaction(
        { signature, blockhash: latest.blockhash, lastValidBlockHeight: latest.lastValidBlockHeight },
        this.commitment
      );
      if (value.err !== null) {
        return { status: "failed", reason: `Transaction ${signature} failed: ${JSON.stringify(value.err)}` };
      }
      return { status: "confirmed", reference: signature };
    } catch (err) {
      if (err instanceof TransactionExpiredBlockheightExceededError) {
        return { status: "failed", reason: `Transaction ${signature} expired before it was confirmed` };
      }
      this.logger.warn({ signature, err }, "Confirmation failed; polling the signature status");
      return this.pollUntilSettled(signature, latest.lastValidBlockHeight);
    }
  }

  /**
   * The transaction may still land until the chain passes its last valid
   * block height. RPC errors here leave the outcome unknown and are thrown.
   */
  private async pollUntilSettled(signature: TransactionSignature, lastValidBlockHeight: number): Promise<TransferResult> {
    try {
      for (;;) {
        const blockHeight = await this.connection.getBlockHeight(this.commitment);
        const { value: status } = await this.connection.getSignatureStatus(signature, {
          searchTransactionHistory: true
        });
        if (status) {
          if (status.err !== null) {
            return { status: "failed", reason: `Transaction ${signature} failed: ${JSON.stringify(status.err)}` };
          }
          if (status.confirmationStatus === "confirmed" || status.confirmationStatus === "finalized") {
            return { status: "confirmed", reference: signature };
          }
        }
        // Height is read before status, so a missing status here means it never landed in time.
        if (!status && blockHeight > lastValidBlockHeight) {
          return { status: "failed", reason: `Transaction ${signature} expired before it was confirmed` };
        }
        await delay(this.pollIntervalMs);
      }
    } catch (err) {
      throw new Error(`Outcome of payout ${signature} is unknown: ${reasonOf(err)}`, { cause: err });
    }
  }
}
