/**
 * XRPL Responder
 *
 * Pays the reply amount of the token back to the sender of a qualifying
 * transaction, with the analysis text and a back-reference as memos.
 *
 * Transaction flow:
 * 1. Build Payment (token amount, reply + in-reply-to memos)
 * 2. Auto-fill sequence/fee/LastLedgerSequence on the live session
 * 3. Sign once with the node wallet
 * 4. Submit and wait for validation, resubmitting the SAME signed blob
 *    on transient failures
 *
 * The sequence number is fixed by step 3, so a resubmission can only
 * land the one payment already signed.
 *
 * The node can only send the token over a trust line to its issuer;
 * ensureTrustLine() opens one when it is missing.
 */

import { Wallet } from "xrpl";
import type { Payment, TrustSet } from "xrpl";
import type { Logger } from "pino";
import type { AccountAddress, OutgoingTransaction } from "@pft-node/types";
import {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  describeError,
  decodeCurrencyCode,
  encodeCurrencyCode,
  isRetryableXrplError,
  sleep,
  withRetry,
} from "@pft-node/chain-observer";
import type { LiveSession, RetryConfig, SubmissionOutcome } from "@pft-node/chain-observer";
import { encodeReplyMemos, truncateUtf8 } from "./memo-encoder.js";
import { SubmissionError, TrustLineError } from "./errors.js";
import type {
  PreparedReply,
  ReplyRequest,
  ResponderConfig,
  TokenRef,
  TrustLineStatus,
} from "./types.js";

const SUCCESS = "tesSUCCESS";

export const DEFAULT_TRUST_LINE_LIMIT = "100000000";

export class XrplResponder {
  private readonly wallet: Wallet;
  private readonly token: TokenRef;
  private readonly amount: string;
  private readonly trustLineLimit: string;
  private readonly feeDrops: string | undefined;
  private readonly retryConfig: RetryConfig;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly logger: Logger | undefined;

  constructor(config: ResponderConfig) {
    this.wallet = Wallet.fromSeed(config.seed);
    this.token = config.token;
    this.amount = config.amount ?? "1";
    this.trustLineLimit = config.trustLineLimit ?? DEFAULT_TRUST_LINE_LIMIT;
    this.feeDrops = config.feeDrops;
    this.retryConfig = config.retry ?? DEFAULT_RETRY_CONFIG;
    this.sleepFn = config.sleep ?? sleep;
    this.logger = config.logger;
  }

  /**
   * The node account replies are sent from.
   */
  get address(): AccountAddress {
    return this.wallet.classicAddress;
  }

  /**
   * Build the reply Payment without submitting (dry-run / inspection).
   */
  buildPayment(request: ReplyRequest): PreparedReply {
    const memoText = truncateUtf8(request.text);
    const memos = encodeReplyMemos(request.text, request.inReplyTo);

    const payment: Payment = {
      TransactionType: "Payment",
      Account: this.wallet.classicAddress,
      Destination: request.toAddress,
      Amount: {
        currency: encodeCurrencyCode(this.token.currency),
        issuer: this.token.issuer,
        value: this.amount,
      },
      Memos: memos.map((memo) => ({
        Memo: {
          MemoType: memo.MemoType,
          MemoData: memo.MemoData,
          ...(memo.MemoFormat !== undefined ? { MemoFormat: memo.MemoFormat } : {}),
        },
      })),
      ...(this.feeDrops !== undefined ? { Fee: this.feeDrops } : {}),
    };

    return { payment, memoText, memos };
  }

  /**
   * Make sure the node account trusts the token issuer, submitting a
   * TrustSet when no line with a positive limit exists.
   *
   * @throws TrustLineError when the TrustSet cannot be signed or fails
   */
  async ensureTrustLine(session: LiveSession): Promise<TrustLineStatus> {
    const currency = decodeCurrencyCode(this.token.currency);
    const lines = await session.trustLines(this.address, this.token.issuer);
    const existing = lines.find(
      (line) => decodeCurrencyCode(line.currency) === currency && Number(line.limit) > 0,
    );
    if (existing !== undefined) {
      this.logger?.debug({ issuer: this.token.issuer, limit: existing.limit }, "Trust line present");
      return "exists";
    }

    const trustSet: TrustSet = {
      TransactionType: "TrustSet",
      Account: this.wallet.classicAddress,
      LimitAmount: {
        currency: encodeCurrencyCode(this.token.currency),
        issuer: this.token.issuer,
        value: this.trustLineLimit,
      },
    };

    let signed: { tx_blob: string; hash: string };
    try {
      signed = this.wallet.sign(await session.autofill(trustSet));
    } catch (err: unknown) {
      throw new TrustLineError(
        "SIGNING_FAILED",
        `Failed to prepare trust line to ${this.token.issuer}: ${describeError(err)}`,
        undefined,
        { cause: err },
      );
    }

    const outcome = await session.submitAndWait(signed.tx_blob);
    if (!outcome.validated || outcome.engineResult !== SUCCESS) {
      throw new TrustLineError(
        "REJECTED",
        `Trust line to ${this.token.issuer} failed on ledger with ${outcome.engineResult}`,
        outcome.engineResult,
      );
    }

    this.logger?.info(
      { issuer: this.token.issuer, limit: this.trustLineLimit, hash: signed.hash },
      "Trust line created",
    );
    return "created";
  }

  /**
   * Send the reply on `session` and wait for it to validate.
   *
   * @throws SubmissionError when no reply is known to have landed
   */
  async respond(session: LiveSession, request: ReplyRequest): Promise<OutgoingTransaction> {
    const { inReplyTo } = request;
    if (!session.isConnected()) {
      throw new SubmissionError(
        "NOT_CONNECTED",
        `No live ledger session to answer ${inReplyTo}`,
        inReplyTo,
      );
    }

    const prepared = this.buildPayment(request);
    const signed = await this.prepareAndSign(session, prepared.payment, inReplyTo);

    let attempts = 0;
    let outcome: SubmissionOutcome;
    try {
      outcome = await withRetry(
        async (attempt) => {
          attempts = attempt;
          return this.submitOnce(session, signed.tx_blob, inReplyTo, attempt);
        },
        this.retryConfig,
        (err) => !(err instanceof SubmissionError) && isRetryableXrplError(err),
        this.sleepFn,
        (err, attempt, delayMs) => {
          this.logger?.warn(
            { txId: inReplyTo, replyHash: signed.hash, attempt, delayMs, reason: describeError(err) },
            "Reply submission failed, resubmitting signed blob",
          );
        },
      );
    } catch (err: unknown) {
      throw toSubmissionError(err, inReplyTo, attempts);
    }

    return {
      txHash: outcome.hash !== "" ? outcome.hash : signed.hash,
      ledgerIndex: outcome.ledgerIndex,
      destination: request.toAddress,
      amount: this.amount,
      asset: { currency: this.token.currency, issuer: this.token.issuer },
      memo: prepared.memoText,
      inReplyTo,
      submittedAt: new Date().toISOString(),
    };
  }

  private async prepareAndSign(
    session: LiveSession,
    payment: Payment,
    inReplyTo: string,
  ): Promise<{ tx_blob: string; hash: string }> {
    try {
      const filled = await session.autofill(payment);
      return this.wallet.sign(filled);
    } catch (err: unknown) {
      throw new SubmissionError(
        "SIGNING_FAILED",
        `Failed to prepare reply to ${inReplyTo}: ${describeError(err)}`,
        inReplyTo,
        0,
        undefined,
        { cause: err },
      );
    }
  }

  /**
   * Single submission attempt of an already-signed blob.
   */
  private async submitOnce(
    session: LiveSession,
    txBlob: string,
    inReplyTo: string,
    attempt: number,
  ): Promise<SubmissionOutcome> {
    const outcome = await session.submitAndWait(txBlob);
    if (!outcome.validated || outcome.engineResult !== SUCCESS) {
      throw new SubmissionError(
        "REJECTED",
        `Reply to ${inReplyTo} failed on ledger with ${outcome.engineResult}`,
        inReplyTo,
        attempt,
        outcome.engineResult,
      );
    }
    return outcome;
  }
}

function toSubmissionError(err: unknown, inReplyTo: string, attempts: number): SubmissionError {
  if (err instanceof SubmissionError) {
    return err;
  }
  if (err instanceof RetryExhaustedError) {
    return new SubmissionError(
      "RETRY_EXHAUSTED",
      `Reply to ${inReplyTo} not confirmed after ${err.attempts} attempts: ${describeError(err.lastError)}`,
      inReplyTo,
      err.attempts,
      undefined,
      { cause: err },
    );
  }

  // Rejected by the retry predicate: a permanent engine error or a dropped socket
  const reason = describeError(err);
  const code = reason.toLowerCase().includes("not connected") ? "NOT_CONNECTED" : "REJECTED";
  return new SubmissionError(
    code,
    `Reply to ${inReplyTo} failed: ${reason}`,
    inReplyTo,
    attempts,
    undefined,
    { cause: err },
  );
}
