/**
 * Monitor Loop
 *
 * Orchestrates the pipeline for every transaction touching the node
 * account:
 *
 *   feed → filter → dedup check → analyze (bounded retry) → respond → dedup record
 *
 * State machine:
 *   CONNECTING → SUBSCRIBED ⇄ PROCESSING
 *   SUBSCRIBED/PROCESSING → CONNECTING   (session dropped)
 *   any → FATAL                          (connectivity exhausted)
 *   any → STOPPED                        (stop())
 *
 * One consumer drains one feed sequentially, so check-then-record needs
 * no lock.
 *
 * Each subscription reads the validated ledger index. After a reconnect
 * the loop backfills from the later of the ledger recorded at the previous
 * subscription and the highest ledger seen on the feed, so payments made
 * while the feed was down are answered even on a node with no traffic.
 *
 * Session preparation (trust line, dedup rebuild) never ends a session:
 * a failure is logged and retried on the next one.
 */

import type { Logger } from "pino";
import type {
  AccountAddress,
  AnalysisResult,
  IncomingTransaction,
  OutgoingTransaction,
  TxHash,
} from "@pft-node/types";
import {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  describeError,
  sleep,
  withRetry,
} from "@pft-node/chain-observer";
import type {
  LiveSession,
  ReconnectHooks,
  RetryConfig,
  SessionConsumer,
} from "@pft-node/chain-observer";
import type { ReplyRequest, TrustLineStatus } from "@pft-node/responder";
import { SubmissionError } from "@pft-node/responder";
import type { TransactionFilter } from "./transaction-filter.js";
import type { DedupLedger } from "./dedup-ledger.js";
import type { MemoAnalyzer } from "./analysis-client.js";
import type { MetricsCollector } from "../middleware/metrics.js";

// =============================================================================
// Types
// =============================================================================

export type MonitorState = "CONNECTING" | "SUBSCRIBED" | "PROCESSING" | "FATAL" | "STOPPED";

export type ProcessOutcome =
  | "ignored"
  | "duplicate"
  | "analysis_failed"
  | "submission_failed"
  | "answered";

/**
 * The part of ConnectionManager the loop depends on.
 */
export interface SessionSupervisor {
  runWithReconnect(consumer: SessionConsumer, hooks?: ReconnectHooks): Promise<void>;
  stop(): Promise<void>;
}

/**
 * The part of XrplResponder the loop depends on.
 */
export interface ReplySender {
  readonly address: AccountAddress;
  respond(session: LiveSession, request: ReplyRequest): Promise<OutgoingTransaction>;
  ensureTrustLine(session: LiveSession): Promise<TrustLineStatus>;
}

export interface DedupRebuildOptions {
  /** account_tx pages read per attempt */
  readonly maxPages: number;

  /** Sessions to try before giving up on the rebuild. Default: 3 */
  readonly maxAttempts?: number;
}

export interface MonitorLoopOptions {
  readonly supervisor: SessionSupervisor;
  readonly filter: TransactionFilter;
  readonly dedup: DedupLedger;
  readonly analyzer: MemoAnalyzer;
  readonly responder: ReplySender;
  readonly logger: Logger;

  /** Analysis retry policy. Default: 3 attempts */
  readonly analysisRetry?: RetryConfig;

  /** Rebuild the dedup ledger from account history on first connect */
  readonly rebuildFromHistory?: DedupRebuildOptions | undefined;

  /** Check the token trust line once per run. Default: true */
  readonly ensureTrustLine?: boolean;

  /** Upper bound on account_tx pages read per backfill. Default: 20 */
  readonly backfillMaxPages?: number;

  /** Sleep function (injectable for testing) */
  readonly sleep?: (ms: number) => Promise<void>;

  readonly metrics?: MetricsCollector;
}

export interface MonitorStatus {
  readonly state: MonitorState;
  readonly nodeAddress: AccountAddress;
  readonly endpoint: string | null;
  readonly answered: number;
  readonly outcomes: Readonly<Record<ProcessOutcome, number>>;
  readonly interruptions: number;
  readonly highestLedger: number | null;
  /** Where the next backfill starts */
  readonly catchUpFrom: number | null;
  readonly lastError: string | null;
  readonly startedAt: string;
}

export const TRANSACTIONS_METRIC = "pft_node_transactions_total";
export const INTERRUPTIONS_METRIC = "pft_node_interruptions_total";

// =============================================================================
// Monitor Loop
// =============================================================================

export class MonitorLoop {
  private readonly supervisor: SessionSupervisor;
  private readonly filter: TransactionFilter;
  private readonly dedup: DedupLedger;
  private readonly analyzer: MemoAnalyzer;
  private readonly responder: ReplySender;
  private readonly logger: Logger;
  private readonly analysisRetry: RetryConfig;
  private readonly rebuild: DedupRebuildOptions | undefined;
  private readonly checkTrustLine: boolean;
  private readonly backfillMaxPages: number;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly metrics: MetricsCollector | undefined;

  /** Ids handled this run, whatever the outcome */
  private readonly processed = new Set<TxHash>();
  private readonly outcomes: Record<ProcessOutcome, number> = {
    ignored: 0,
    duplicate: 0,
    analysis_failed: 0,
    submission_failed: 0,
    answered: 0,
  };

  private state: MonitorState = "CONNECTING";
  private session: LiveSession | null = null;
  private highestLedger: number | null = null;
  /** Validated ledger when the last subscription was made */
  private subscribedLedger: number | null = null;
  private interruptions = 0;
  private lastError: string | null = null;
  private rebuilt = false;
  private rebuildFailures = 0;
  private trustLineReady = false;
  private stopping = false;
  private readonly startedAt = new Date().toISOString();

  constructor(options: MonitorLoopOptions) {
    this.supervisor = options.supervisor;
    this.filter = options.filter;
    this.dedup = options.dedup;
    this.analyzer = options.analyzer;
    this.responder = options.responder;
    this.logger = options.logger;
    this.analysisRetry = options.analysisRetry ?? DEFAULT_RETRY_CONFIG;
    this.rebuild = options.rebuildFromHistory;
    this.checkTrustLine = options.ensureTrustLine ?? true;
    this.backfillMaxPages = options.backfillMaxPages ?? 20;
    this.sleepFn = options.sleep ?? sleep;
    this.metrics = options.metrics;
  }

  get nodeAddress(): AccountAddress {
    return this.responder.address;
  }

  /**
   * Run until stop() or until connectivity is exhausted.
   *
   * @throws ConnectivityError when the supervisor gives up (state FATAL)
   */
  async run(): Promise<void> {
    this.stopping = false;
    this.state = "CONNECTING";

    try {
      await this.supervisor.runWithReconnect(
        (session, ready) => this.consume(session, ready),
        {
          onConnected: (session) => {
            this.session = session;
            this.logger.info({ endpoint: session.endpoint.url }, "Ledger session opened");
          },
          onInterruption: (error, consecutiveFailures, delayMs) => {
            this.session = null;
            this.interruptions++;
            this.lastError = error.message;
            this.metrics?.incrementCounter(INTERRUPTIONS_METRIC);
            this.setState("CONNECTING");
            this.logger.warn(
              { reason: error.message, consecutiveFailures, delayMs },
              "Ledger feed interrupted",
            );
          },
        },
      );
    } catch (err: unknown) {
      this.session = null;
      this.state = "FATAL";
      this.lastError = describeError(err);
      this.logger.fatal({ err }, "Ledger connectivity exhausted");
      throw err;
    }

    this.session = null;
    this.state = "STOPPED";
  }

  /**
   * Close the live session and make run() resolve.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.state = "STOPPED";
    await this.supervisor.stop();
  }

  status(): MonitorStatus {
    return {
      state: this.state,
      nodeAddress: this.nodeAddress,
      endpoint: this.session?.endpoint.url ?? null,
      answered: this.dedup.size,
      outcomes: { ...this.outcomes },
      interruptions: this.interruptions,
      highestLedger: this.highestLedger,
      catchUpFrom: this.catchUpFrom(),
      lastError: this.lastError,
      startedAt: this.startedAt,
    };
  }

  /**
   * Run one transaction through filter, dedup, analysis and reply.
   */
  async processTransaction(tx: IncomingTransaction): Promise<ProcessOutcome> {
    const outcome = await this.evaluate(tx);
    this.outcomes[outcome]++;
    this.metrics?.incrementCounter(TRANSACTIONS_METRIC, { outcome });
    return outcome;
  }

  // ─── Session consumer ───────────────────────────────────────────

  private async consume(session: LiveSession, ready: () => void): Promise<void> {
    this.session = session;
    const feed = await session.subscribe(this.nodeAddress);
    const currentLedger = await session.validatedLedgerIndex();
    this.setState("SUBSCRIBED");

    if (this.checkTrustLine && !this.trustLineReady) {
      await this.prepareTrustLine(session);
    }
    if (this.rebuild !== undefined && !this.rebuilt) {
      await this.rebuildDedup(session, this.rebuild);
    }

    const from = this.catchUpFrom();
    if (from !== null) {
      await this.backfill(session, from);
    }
    // Everything up to here is covered by the backfill or the new feed
    this.subscribedLedger = Math.max(this.subscribedLedger ?? currentLedger, currentLedger);
    ready();

    for await (const tx of feed) {
      await this.handle(tx);
    }
  }

  private async handle(tx: IncomingTransaction): Promise<void> {
    if (tx.validated && (this.highestLedger === null || tx.ledgerIndex > this.highestLedger)) {
      this.highestLedger = tx.ledgerIndex;
    }

    this.setState("PROCESSING");
    try {
      await this.processTransaction(tx);
    } finally {
      this.setState("SUBSCRIBED");
    }
  }

  /**
   * Read history from `fromLedger` (inclusive) so payments that arrived
   * while the feed was down are answered. Already handled ids come back
   * as duplicates.
   */
  private async backfill(session: LiveSession, fromLedger: number): Promise<void> {
    let marker: unknown;
    let pages = 0;
    let seen = 0;

    do {
      const page = await session.accountTransactions({
        account: this.nodeAddress,
        ledgerIndexMin: fromLedger,
        ledgerIndexMax: -1,
        forward: true,
        ...(marker !== undefined ? { marker } : {}),
      });
      for (const tx of page.transactions) {
        seen++;
        await this.handle(tx);
      }
      marker = page.marker;
      pages++;
    } while (marker !== undefined && pages < this.backfillMaxPages);

    this.logger.info({ fromLedger, pages, transactions: seen }, "Backfill complete");
  }

  /**
   * Backfill start: the later of the last subscription ledger and the
   * highest ledger seen. Null before the first subscription.
   */
  private catchUpFrom(): number | null {
    if (this.subscribedLedger === null) return this.highestLedger;
    if (this.highestLedger === null) return this.subscribedLedger;
    return Math.max(this.subscribedLedger, this.highestLedger);
  }

  private async prepareTrustLine(session: LiveSession): Promise<void> {
    try {
      const status = await this.responder.ensureTrustLine(session);
      this.trustLineReady = true;
      this.logger.info({ status }, "Token trust line ready");
    } catch (err: unknown) {
      // Replies fail until the line exists; checked again on the next session
      this.lastError = describeError(err);
      this.logger.error({ reason: this.lastError }, "Token trust line check failed");
    }
  }

  private async rebuildDedup(session: LiveSession, options: DedupRebuildOptions): Promise<void> {
    const maxAttempts = options.maxAttempts ?? 3;
    try {
      const added = await this.dedup.rebuildFromHistory(session, this.nodeAddress, options.maxPages);
      this.rebuilt = true;
      this.logger.info({ added, answered: this.dedup.size }, "Dedup ledger rebuilt from history");
    } catch (err: unknown) {
      this.rebuildFailures++;
      this.lastError = describeError(err);
      if (this.rebuildFailures >= maxAttempts) {
        this.rebuilt = true;
        this.logger.warn(
          { reason: this.lastError, attempts: this.rebuildFailures },
          "Dedup rebuild abandoned, relying on recorded answers only",
        );
      } else {
        this.logger.warn(
          { reason: this.lastError, attempts: this.rebuildFailures },
          "Dedup rebuild from history failed, retrying on next session",
        );
      }
    }
  }

  // ─── Pipeline ───────────────────────────────────────────────────

  private async evaluate(tx: IncomingTransaction): Promise<ProcessOutcome> {
    const log = this.logger.child({ txId: tx.id });

    const rejection = this.filter.explain(tx);
    if (rejection !== null || tx.memo === undefined) {
      log.debug({ reason: rejection }, "Ignoring transaction");
      return "ignored";
    }

    if (this.processed.has(tx.id) || this.dedup.alreadyAnswered(tx.id)) {
      log.debug("Transaction already handled");
      return "duplicate";
    }
    this.processed.add(tx.id);

    const analysis = await this.analyzeWithRetry(tx.memo, log);
    if (!analysis.success) {
      this.lastError = describeError(analysis.error);
      log.warn({ reason: this.lastError }, "Analysis failed, skipping transaction");
      return "analysis_failed";
    }

    const session = this.session;
    if (session === null) {
      this.lastError = "No live ledger session";
      log.warn("No live ledger session, skipping transaction");
      return "submission_failed";
    }

    let outgoing: OutgoingTransaction;
    try {
      outgoing = await this.responder.respond(session, {
        toAddress: tx.sender,
        text: analysis.text,
        inReplyTo: tx.id,
      });
    } catch (err: unknown) {
      this.lastError = describeError(err);
      log.warn(
        {
          code: err instanceof SubmissionError ? err.code : undefined,
          reason: this.lastError,
        },
        "Reply submission failed, skipping transaction",
      );
      return "submission_failed";
    }

    try {
      this.dedup.record(tx.id, outgoing.txHash);
    } catch (err: unknown) {
      // The reply landed; the processed set still blocks a second one this run
      log.error({ err, replyHash: outgoing.txHash }, "Failed to record answered transaction");
    }

    log.info(
      { replyHash: outgoing.txHash, ledgerIndex: outgoing.ledgerIndex, to: tx.sender },
      "Answered transaction",
    );
    return "answered";
  }

  private async analyzeWithRetry(
    memo: string,
    log: Logger,
  ): Promise<AnalysisResult> {
    try {
      return await withRetry(
        async () => {
          const result = await this.analyzer.analyze(memo);
          if (!result.success) {
            throw result.error ?? new Error("Analysis failed");
          }
          return result;
        },
        this.analysisRetry,
        () => true,
        this.sleepFn,
        (err, attempt, delayMs) => {
          log.warn({ attempt, delayMs, reason: describeError(err) }, "Analysis attempt failed");
        },
      );
    } catch (err: unknown) {
      const error = err instanceof RetryExhaustedError && err.lastError instanceof Error
        ? err.lastError
        : new Error(describeError(err));
      return { sourceText: memo, text: "", success: false, error };
    }
  }

  private setState(next: MonitorState): void {
    if (this.stopping || this.state === "FATAL") return;
    this.state = next;
  }
}
