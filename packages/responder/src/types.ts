/**
 * @pft-node/responder domain types.
 */

import type { Logger } from "pino";
import type { Payment } from "xrpl";
import type { AccountAddress, TxHash } from "@pft-node/types";
import type { RetryConfig } from "@pft-node/chain-observer";

// =============================================================================
// XRPL Memo
// =============================================================================

/**
 * An XRPL transaction memo, every field already hex-encoded.
 */
export interface XrplMemo {
  readonly MemoType: string;
  readonly MemoData: string;
  readonly MemoFormat?: string;
}

// =============================================================================
// Requests
// =============================================================================

/**
 * What to send back, and to whom.
 */
export interface ReplyRequest {
  /** Sender of the incoming transaction */
  readonly toAddress: AccountAddress;

  /** Analysis text; truncated to MAX_REPLY_BYTES before encoding */
  readonly text: string;

  /** Hash of the incoming transaction being answered */
  readonly inReplyTo: TxHash;
}

/**
 * A reply built without touching the network.
 */
export interface PreparedReply {
  readonly payment: Payment;

  /** Memo text after truncation */
  readonly memoText: string;

  readonly memos: readonly XrplMemo[];
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * The issued token replies are paid in.
 */
export interface TokenRef {
  /** Three-letter or long-form currency code (e.g. "PFT") */
  readonly currency: string;

  /** Issuing account (r-address) */
  readonly issuer: AccountAddress;
}

export interface ResponderConfig {
  /** Node wallet seed; used for signing and never logged */
  readonly seed: string;

  readonly token: TokenRef;

  /** Reply amount in token units. Default: "1" */
  readonly amount?: string;

  /** Trust line limit set when the node opens its line. Default: "100000000" */
  readonly trustLineLimit?: string;

  /** Optional: fee in drops (autofilled when absent) */
  readonly feeDrops?: string;

  /** Resubmission policy for the signed blob */
  readonly retry?: RetryConfig;

  /** Sleep function (injectable for testing) */
  readonly sleep?: (ms: number) => Promise<void>;

  readonly logger?: Logger;
}

/**
 * Result of XrplResponder.ensureTrustLine.
 */
export type TrustLineStatus = "exists" | "created";
