/**
 * Tests for reply memo encoding.
 */

import { describe, it, expect } from "vitest";
import { toHex } from "@pft-node/chain-observer";
import {
  encodeReplyMemos,
  findReplyReference,
  isReplyMemo,
  truncateUtf8,
  IN_REPLY_TO_MEMO_TYPE,
  MAX_REPLY_BYTES,
  REPLY_MEMO_TYPE,
} from "../src/memo-encoder.js";

describe("truncateUtf8", () => {
  it("leaves short text alone", () => {
    expect(truncateUtf8("greeting acknowledged")).toBe("greeting acknowledged");
  });

  it("caps ASCII text at MAX_REPLY_BYTES", () => {
    expect(truncateUtf8("x".repeat(800))).toBe("x".repeat(MAX_REPLY_BYTES));
  });

  it("never splits a two-byte character", () => {
    // "aé" = 61 C3 A9
    expect(truncateUtf8("aé", 2)).toBe("a");
  });

  it("never splits a four-byte character", () => {
    expect(truncateUtf8("😀😀", 6)).toBe("😀");
    expect(truncateUtf8("😀😀", 8)).toBe("😀😀");
  });

  it("returns whole characters that fit exactly", () => {
    expect(truncateUtf8("ééé", 4)).toBe("éé");
  });
});

describe("encodeReplyMemos", () => {
  it("encodes the reply and the back-reference as uppercase hex", () => {
    const memos = encodeReplyMemos("greeting acknowledged", "TX1");

    expect(memos).toEqual([
      {
        MemoType: toHex("pft-node/reply"),
        MemoData: toHex("greeting acknowledged"),
        MemoFormat: toHex("text/plain"),
      },
      {
        MemoType: toHex("pft-node/in-reply-to"),
        MemoData: toHex("TX1"),
      },
    ]);
    for (const memo of memos) {
      expect(memo.MemoType).toMatch(/^[0-9A-F]+$/);
      expect(memo.MemoData).toMatch(/^[0-9A-F]+$/);
    }
  });

  it("truncates long reply text", () => {
    const [reply] = encodeReplyMemos("y".repeat(1000), "TX1");
    expect(reply?.MemoData).toHaveLength(MAX_REPLY_BYTES * 2);
  });
});

describe("findReplyReference", () => {
  it("returns the referenced hash", () => {
    expect(
      findReplyReference([
        { type: REPLY_MEMO_TYPE, data: "ok" },
        { type: IN_REPLY_TO_MEMO_TYPE, data: "TX1" },
      ]),
    ).toBe("TX1");
  });

  it("returns undefined without a back-reference", () => {
    expect(findReplyReference([{ data: "hello" }])).toBeUndefined();
    expect(findReplyReference([{ type: IN_REPLY_TO_MEMO_TYPE, data: "  " }])).toBeUndefined();
  });
});

describe("isReplyMemo", () => {
  it("detects node replies", () => {
    expect(isReplyMemo([{ type: REPLY_MEMO_TYPE, data: "ok" }])).toBe(true);
    expect(isReplyMemo([{ data: "hello" }])).toBe(false);
  });
});
