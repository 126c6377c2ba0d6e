/**
 * @pft-node/responder — Reply payments for the PFT memo node.
 *
 * Provides:
 * - Reply and in-reply-to memo encoding with UTF-8 safe truncation
 * - XrplResponder: sign once, resubmit the same blob on transient failure
 * - Trust line check and setup for the node account
 *
 * Design rules:
 * - A failed submission never counts as answered
 * - No network access outside respond() and ensureTrustLine()
 */

// Types
export type {
  XrplMemo,
  ReplyRequest,
  PreparedReply,
  TokenRef,
  ResponderConfig,
  TrustLineStatus,
} from "./types.js";

// Errors
export { SubmissionError, TrustLineError } from "./errors.js";
export type { SubmissionErrorCode, TrustLineErrorCode } from "./errors.js";

// Memo encoding
export {
  REPLY_MEMO_TYPE,
  IN_REPLY_TO_MEMO_TYPE,
  MEMO_FORMAT,
  MAX_REPLY_BYTES,
  truncateUtf8,
  encodeReplyMemos,
  findReplyReference,
  isReplyMemo,
} from "./memo-encoder.js";

export { DEFAULT_TRUST_LINE_LIMIT } from "./responder.js";

// Responder
export { XrplResponder } from "./responder.js";
