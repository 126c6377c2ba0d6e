/**
 * Reply submission errors.
 *
 * A SubmissionError always means no reply is known to have landed, so the
 * incoming transaction must not be marked answered.
 */

import type { TxHash } from "@pft-node/types";

export type SubmissionErrorCode =
  | "NOT_CONNECTED"
  | "SIGNING_FAILED"
  | "REJECTED"
  | "RETRY_EXHAUSTED";

export class SubmissionError extends Error {
  constructor(
    public readonly code: SubmissionErrorCode,
    message: string,
    /** Incoming transaction the reply was for */
    public readonly inReplyTo: TxHash,
    /** Submission attempts made with the signed blob */
    public readonly attempts: number = 0,
    /** Engine result when the ledger produced one */
    public readonly engineResult?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SubmissionError";
  }
}

export type TrustLineErrorCode = "SIGNING_FAILED" | "REJECTED";

/**
 * The node account could not open its token trust line.
 */
export class TrustLineError extends Error {
  constructor(
    public readonly code: TrustLineErrorCode,
    message: string,
    public readonly engineResult?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TrustLineError";
  }
}
