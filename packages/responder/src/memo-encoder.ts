/**
 * Reply Memo Encoder
 *
 * A reply carries two memos:
 * - "pft-node/reply" (format "text/plain"): the analysis text
 * - "pft-node/in-reply-to": hash of the incoming transaction
 *
 * All memo fields are uppercase hex. The Memos field of a transaction is
 * limited to about 1 KB, so reply text is capped at MAX_REPLY_BYTES of
 * UTF-8 and cut on a code point boundary.
 */

import type { DecodedMemo, TxHash } from "@pft-node/types";
import { toHex } from "@pft-node/chain-observer";
import type { XrplMemo } from "./types.js";

export const REPLY_MEMO_TYPE = "pft-node/reply";

export const IN_REPLY_TO_MEMO_TYPE = "pft-node/in-reply-to";

export const MEMO_FORMAT = "text/plain";

/** UTF-8 bytes of reply text kept in the memo */
export const MAX_REPLY_BYTES = 700;

/**
 * Truncate to at most `maxBytes` of UTF-8 without splitting a code point.
 */
export function truncateUtf8(text: string, maxBytes: number = MAX_REPLY_BYTES): string {
  const bytes = Buffer.from(text, "utf8");
  if (bytes.length <= maxBytes) {
    return text;
  }

  let cut = maxBytes;
  // Back off over continuation bytes (10xxxxxx)
  while (cut > 0 && (bytes.readUInt8(cut) & 0xc0) === 0x80) {
    cut--;
  }
  return bytes.subarray(0, cut).toString("utf8");
}

/**
 * Encode the reply text and its back-reference.
 */
export function encodeReplyMemos(text: string, inReplyTo: TxHash): readonly XrplMemo[] {
  return [
    {
      MemoType: toHex(REPLY_MEMO_TYPE),
      MemoData: toHex(truncateUtf8(text)),
      MemoFormat: toHex(MEMO_FORMAT),
    },
    {
      MemoType: toHex(IN_REPLY_TO_MEMO_TYPE),
      MemoData: toHex(inReplyTo),
    },
  ];
}

/**
 * Find the incoming hash a reply points at, if the memos form one.
 */
export function findReplyReference(memos: readonly DecodedMemo[]): TxHash | undefined {
  const reference = memos.find((memo) => memo.type === IN_REPLY_TO_MEMO_TYPE);
  const hash = reference?.data.trim();
  return hash === undefined || hash === "" ? undefined : hash;
}

/**
 * Check if decoded memos carry a node reply.
 */
export function isReplyMemo(memos: readonly DecodedMemo[]): boolean {
  return memos.some((memo) => memo.type === REPLY_MEMO_TYPE);
}
