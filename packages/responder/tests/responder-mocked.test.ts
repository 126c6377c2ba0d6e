/**
 * Tests for XrplResponder with a mocked wallet and an in-process session.
 *
 * Covers: payment construction, sign-once resubmission, and the
 * SubmissionError codes.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Payment, TrustSet } from "xrpl";
import type {
  LiveSession,
  RetryConfig,
  SubmissionOutcome,
  TrustLine,
} from "@pft-node/chain-observer";
import { toHex } from "@pft-node/chain-observer";
import { XrplResponder } from "../src/responder.js";
import { SubmissionError, TrustLineError } from "../src/errors.js";
import type { ResponderConfig } from "../src/types.js";

const mockSign = vi.fn();

vi.mock("xrpl", () => ({
  Client: vi.fn(),
  Wallet: {
    fromSeed: vi.fn(() => ({
      classicAddress: "rNodeAddress",
      sign: mockSign,
    })),
  },
}));

// =============================================================================
// Helpers
// =============================================================================

const retry: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 10,
  maxDelayMs: 100,
  jitterMs: 0,
};

const config: ResponderConfig = {
  seed: "test-secret",
  token: { currency: "PFT", issuer: "rIssuer" },
  retry,
  sleep: async () => {},
};

const request = { toAddress: "rSender", text: "greeting acknowledged", inReplyTo: "TX1" };

const validated: SubmissionOutcome = {
  hash: "REPLY1",
  ledgerIndex: 500,
  engineResult: "tesSUCCESS",
  validated: true,
};

function makeSession() {
  // Records each transaction and returns the fields the ledger fills in
  const autofill = vi.fn(async (_tx: Payment | TrustSet) => ({
    Sequence: 7,
    Fee: "12",
    LastLedgerSequence: 520,
  }));
  const trustLines = vi.fn(
    async (_account: string, _peer: string): Promise<readonly TrustLine[]> => [],
  );
  const submitAndWait = vi.fn(async (_blob: string): Promise<SubmissionOutcome> => validated);
  const isConnected = vi.fn(() => true);

  const session: LiveSession = {
    endpoint: { url: "wss://xrpl.test", rank: 0, label: "public" },
    subscribe: vi.fn(),
    accountTransactions: vi.fn(),
    validatedLedgerIndex: vi.fn(async () => 1),
    trustLines,
    autofill: async <T extends Payment | TrustSet>(tx: T): Promise<T> => ({
      ...tx,
      ...(await autofill(tx)),
    }),
    submitAndWait,
    isConnected,
    close: vi.fn(async () => {}),
  };
  return { session, autofill, trustLines, submitAndWait, isConnected };
}

describe("XrplResponder", () => {
  beforeEach(() => {
    mockSign.mockReset();
    mockSign.mockReturnValue({ tx_blob: "SIGNED_BLOB", hash: "SIGNED_HASH" });
  });

  // ===========================================================================
  // buildPayment
  // ===========================================================================

  it("builds a token payment back to the sender with both memos", () => {
    const responder = new XrplResponder(config);
    const { payment, memoText } = responder.buildPayment(request);

    expect(responder.address).toBe("rNodeAddress");
    expect(memoText).toBe("greeting acknowledged");
    expect(payment).toEqual({
      TransactionType: "Payment",
      Account: "rNodeAddress",
      Destination: "rSender",
      Amount: { currency: "PFT", issuer: "rIssuer", value: "1" },
      Memos: [
        {
          Memo: {
            MemoType: toHex("pft-node/reply"),
            MemoData: toHex("greeting acknowledged"),
            MemoFormat: toHex("text/plain"),
          },
        },
        {
          Memo: {
            MemoType: toHex("pft-node/in-reply-to"),
            MemoData: toHex("TX1"),
          },
        },
      ],
    });
  });

  it("uses the configured amount, fee and long currency code", () => {
    const responder = new XrplResponder({
      ...config,
      token: { currency: "PFTNODE", issuer: "rIssuer" },
      amount: "2.5",
      feeDrops: "15",
    });
    const { payment } = responder.buildPayment(request);

    expect(payment.Amount).toEqual({
      currency: "5046544E4F4445" + "0".repeat(26),
      issuer: "rIssuer",
      value: "2.5",
    });
    expect(payment.Fee).toBe("15");
  });

  // ===========================================================================
  // respond
  // ===========================================================================

  it("autofills, signs once and returns the outgoing transaction", async () => {
    const { session, autofill, submitAndWait } = makeSession();
    const responder = new XrplResponder(config);

    const outgoing = await responder.respond(session, request);

    expect(autofill).toHaveBeenCalledOnce();
    expect(mockSign).toHaveBeenCalledOnce();
    expect(mockSign.mock.calls[0]?.[0]).toMatchObject({ Sequence: 7, LastLedgerSequence: 520 });
    expect(submitAndWait).toHaveBeenCalledWith("SIGNED_BLOB");
    expect(outgoing).toMatchObject({
      txHash: "REPLY1",
      ledgerIndex: 500,
      destination: "rSender",
      amount: "1",
      asset: { currency: "PFT", issuer: "rIssuer" },
      memo: "greeting acknowledged",
      inReplyTo: "TX1",
    });
    expect(Number.isNaN(Date.parse(outgoing.submittedAt))).toBe(false);
  });

  it("falls back to the signed hash when the result carries none", async () => {
    const { session, submitAndWait } = makeSession();
    submitAndWait.mockResolvedValueOnce({ ...validated, hash: "" });

    const outgoing = await new XrplResponder(config).respond(session, request);
    expect(outgoing.txHash).toBe("SIGNED_HASH");
  });

  it("resubmits the same signed blob after a transient failure", async () => {
    const { session, submitAndWait } = makeSession();
    submitAndWait.mockRejectedValueOnce(new Error("Timeout for request"));

    const outgoing = await new XrplResponder(config).respond(session, request);

    expect(outgoing.txHash).toBe("REPLY1");
    expect(mockSign).toHaveBeenCalledOnce();
    expect(submitAndWait).toHaveBeenCalledTimes(2);
    expect(submitAndWait.mock.calls.map((call) => call[0])).toEqual(["SIGNED_BLOB", "SIGNED_BLOB"]);
  });

  it("throws RETRY_EXHAUSTED when every resubmission fails", async () => {
    const { session, submitAndWait } = makeSession();
    submitAndWait.mockRejectedValue(new Error("Timeout for request"));

    const err = await new XrplResponder(config).respond(session, request).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SubmissionError);
    expect(err).toMatchObject({ code: "RETRY_EXHAUSTED", attempts: 3, inReplyTo: "TX1" });
    expect(submitAndWait).toHaveBeenCalledTimes(3);
    expect(mockSign).toHaveBeenCalledOnce();
  });

  it("throws REJECTED for a validated non-tesSUCCESS result without retrying", async () => {
    const { session, submitAndWait } = makeSession();
    submitAndWait.mockResolvedValue({ ...validated, engineResult: "tecPATH_DRY" });

    const err = await new XrplResponder(config).respond(session, request).catch((e: unknown) => e);

    expect(err).toMatchObject({ code: "REJECTED", engineResult: "tecPATH_DRY", attempts: 1 });
    expect(submitAndWait).toHaveBeenCalledOnce();
  });

  it("throws REJECTED for a permanent engine error", async () => {
    const { session, submitAndWait } = makeSession();
    submitAndWait.mockRejectedValue(new Error("tecNO_DST"));

    const err = await new XrplResponder(config).respond(session, request).catch((e: unknown) => e);

    expect(err).toMatchObject({ code: "REJECTED", attempts: 1 });
    expect(submitAndWait).toHaveBeenCalledOnce();
  });

  it("throws NOT_CONNECTED without a live session", async () => {
    const { session, isConnected, autofill } = makeSession();
    isConnected.mockReturnValue(false);

    await expect(new XrplResponder(config).respond(session, request)).rejects.toMatchObject({
      code: "NOT_CONNECTED",
    });
    expect(autofill).not.toHaveBeenCalled();
  });

  it("throws NOT_CONNECTED when the socket drops during submission", async () => {
    const { session, submitAndWait } = makeSession();
    submitAndWait.mockRejectedValue(new Error("NotConnectedError: websocket not connected"));

    await expect(new XrplResponder(config).respond(session, request)).rejects.toMatchObject({
      code: "NOT_CONNECTED",
    });
    expect(submitAndWait).toHaveBeenCalledOnce();
  });

  it("throws SIGNING_FAILED when autofill fails", async () => {
    const { session, autofill, submitAndWait } = makeSession();
    autofill.mockRejectedValueOnce(new Error("actNotFound"));

    await expect(new XrplResponder(config).respond(session, request)).rejects.toMatchObject({
      code: "SIGNING_FAILED",
      message: "Failed to prepare reply to TX1: actNotFound",
    });
    expect(submitAndWait).not.toHaveBeenCalled();
  });

  it("throws SIGNING_FAILED when signing throws", async () => {
    const { session, submitAndWait } = makeSession();
    mockSign.mockImplementationOnce(() => {
      throw new Error("bad key");
    });

    await expect(new XrplResponder(config).respond(session, request)).rejects.toMatchObject({
      code: "SIGNING_FAILED",
    });
    expect(submitAndWait).not.toHaveBeenCalled();
  });

  it("truncates the reply memo to MAX_REPLY_BYTES", async () => {
    const { session } = makeSession();
    const outgoing = await new XrplResponder(config).respond(session, {
      ...request,
      text: "z".repeat(900),
    });
    expect(outgoing.memo).toHaveLength(700);
  });

  // ===========================================================================
  // ensureTrustLine
  // ===========================================================================

  describe("ensureTrustLine", () => {
    it("leaves an existing line alone", async () => {
      const { session, trustLines, submitAndWait } = makeSession();
      trustLines.mockResolvedValueOnce([
        { currency: "PFT", peer: "rIssuer", limit: "100000000", balance: "3" },
      ]);
      const responder = new XrplResponder(config);

      await expect(responder.ensureTrustLine(session)).resolves.toBe("exists");
      expect(trustLines).toHaveBeenCalledWith("rNodeAddress", "rIssuer");
      expect(submitAndWait).not.toHaveBeenCalled();
    });

    it("opens a line when none has a positive limit", async () => {
      const { session, trustLines, autofill, submitAndWait } = makeSession();
      trustLines.mockResolvedValueOnce([
        { currency: "PFT", peer: "rIssuer", limit: "0", balance: "0" },
        { currency: "USD", peer: "rIssuer", limit: "10", balance: "0" },
      ]);
      const responder = new XrplResponder({ ...config, trustLineLimit: "5000" });

      await expect(responder.ensureTrustLine(session)).resolves.toBe("created");
      expect(autofill).toHaveBeenCalledWith({
        TransactionType: "TrustSet",
        Account: "rNodeAddress",
        LimitAmount: { currency: "PFT", issuer: "rIssuer", value: "5000" },
      });
      expect(mockSign).toHaveBeenCalledWith({
        TransactionType: "TrustSet",
        Account: "rNodeAddress",
        LimitAmount: { currency: "PFT", issuer: "rIssuer", value: "5000" },
        Sequence: 7,
        Fee: "12",
        LastLedgerSequence: 520,
      });
      expect(submitAndWait).toHaveBeenCalledWith("SIGNED_BLOB");
    });

    it("uses the default limit", async () => {
      const { session, autofill } = makeSession();
      const responder = new XrplResponder(config);

      await responder.ensureTrustLine(session);

      expect(autofill).toHaveBeenCalledWith(
        expect.objectContaining({
          LimitAmount: { currency: "PFT", issuer: "rIssuer", value: "100000000" },
        }),
      );
    });

    it("throws REJECTED when the TrustSet fails on ledger", async () => {
      const { session, submitAndWait } = makeSession();
      submitAndWait.mockResolvedValueOnce({ ...validated, engineResult: "tecNO_LINE_INSUF_RESERVE" });
      const responder = new XrplResponder(config);

      const err = await responder.ensureTrustLine(session).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TrustLineError);
      expect(err).toMatchObject({
        code: "REJECTED",
        engineResult: "tecNO_LINE_INSUF_RESERVE",
        message: "Trust line to rIssuer failed on ledger with tecNO_LINE_INSUF_RESERVE",
      });
    });

    it("throws SIGNING_FAILED when autofill fails", async () => {
      const { session, autofill, submitAndWait } = makeSession();
      autofill.mockRejectedValueOnce(new Error("actNotFound"));
      const responder = new XrplResponder(config);

      await expect(responder.ensureTrustLine(session)).rejects.toMatchObject({
        code: "SIGNING_FAILED",
        message: "Failed to prepare trust line to rIssuer: actNotFound",
      });
      expect(submitAndWait).not.toHaveBeenCalled();
    });
  });
});
