/**
 * Test helpers for @pft-node/node.
 *
 * In-process stand-ins for the ledger session, the analysis API and the
 * responder, so the monitor loop runs end to end without a network.
 */

import { vi } from "vitest";
import pino from "pino";
import type {
  AnalysisResult,
  Endpoint,
  IncomingTransaction,
  OutgoingTransaction,
} from "@pft-node/types";
import { FeedQueue } from "@pft-node/chain-observer";
import type {
  AccountHistoryPage,
  AccountHistoryQuery,
  LiveSession,
  SubmissionOutcome,
  TransactionFeed,
  TrustLine,
} from "@pft-node/chain-observer";
import type { ReplyRequest, TrustLineStatus } from "@pft-node/responder";
import type { AnalysisError, MemoAnalyzer } from "../src/services/analysis-client.js";
import type { ReplySender } from "../src/services/monitor-loop.js";

export const NODE_ADDRESS = "rNodeTestAddress";
export const ISSUER = "rIssuerTestAddress";
export const ENDPOINT: Endpoint = { url: "wss://ledger.test", rank: 0, label: "public" };

export const silentLogger = pino({ level: "silent" });

/**
 * A qualifying PFT payment to the node unless overridden.
 */
export function makeTx(overrides: Partial<IncomingTransaction> = {}): IncomingTransaction {
  return {
    id: "TX1",
    sender: "rSenderTestAddress",
    destination: NODE_ADDRESS,
    amount: "1",
    asset: { currency: "PFT", issuer: ISSUER },
    memo: "hello",
    memos: [{ data: overrides.memo ?? "hello" }],
    ledgerIndex: 100,
    validated: true,
    succeeded: true,
    ...overrides,
  };
}

// =============================================================================
// Ledger session
// =============================================================================

export class FakeLedgerSession implements LiveSession {
  readonly feed = new FeedQueue<IncomingTransaction>();
  readonly queries: AccountHistoryQuery[] = [];
  closed = false;

  /** Returned by accountTransactions, oldest first */
  history: IncomingTransaction[] = [];

  /** Returned by validatedLedgerIndex */
  validatedLedger = 1;

  lines: TrustLine[] = [];

  constructor(readonly endpoint: Endpoint = ENDPOINT) {}

  async subscribe(_account: string): Promise<TransactionFeed> {
    return this.feed;
  }

  async accountTransactions(query: AccountHistoryQuery): Promise<AccountHistoryPage> {
    this.queries.push(query);
    if (query.forward === true) {
      const min = query.ledgerIndexMin ?? -1;
      return { transactions: this.history.filter((tx) => min < 0 || tx.ledgerIndex >= min) };
    }
    return { transactions: [...this.history].reverse() };
  }

  async validatedLedgerIndex(): Promise<number> {
    return this.validatedLedger;
  }

  async trustLines(_account: string, peer: string): Promise<readonly TrustLine[]> {
    return this.lines.filter((line) => line.peer === peer);
  }

  async autofill<T>(transaction: T): Promise<T> {
    return transaction;
  }

  async submitAndWait(_txBlob: string): Promise<SubmissionOutcome> {
    return { hash: "", ledgerIndex: 0, engineResult: "tesSUCCESS", validated: true };
  }

  isConnected(): boolean {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.feed.end();
  }
}

// =============================================================================
// Analysis
// =============================================================================

/**
 * Analyzer answering from a fixed table; unknown memos get an echo.
 */
export function fakeAnalyzer(answers: Record<string, string> = { hello: "greeting acknowledged" }) {
  const analyze = vi.fn(async (text: string): Promise<AnalysisResult<AnalysisError>> => ({
    sourceText: text,
    text: answers[text] ?? `analysis of ${text}`,
    success: true,
  }));
  const analyzer: MemoAnalyzer = { analyze };
  return { analyzer, analyze };
}

// =============================================================================
// Responder
// =============================================================================

export function fakeResponder() {
  const respond = vi.fn(
    async (_session: LiveSession, request: ReplyRequest): Promise<OutgoingTransaction> => ({
      txHash: `REPLY-${request.inReplyTo}`,
      ledgerIndex: 200,
      destination: request.toAddress,
      amount: "1",
      asset: { currency: "PFT", issuer: ISSUER },
      memo: request.text,
      inReplyTo: request.inReplyTo,
      submittedAt: "2026-01-01T00:00:00.000Z",
    }),
  );
  const ensureTrustLine = vi.fn(async (_session: LiveSession): Promise<TrustLineStatus> => "exists");
  const responder: ReplySender = { address: NODE_ADDRESS, respond, ensureTrustLine };
  return { responder, respond, ensureTrustLine };
}
