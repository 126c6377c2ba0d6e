/**
 * XRPL Session — LiveSession over an xrpl.js WebSocket client.
 *
 * Capabilities:
 * - `accounts` stream subscription, normalized into a FeedQueue
 * - Account history paging (`account_tx`)
 * - Autofill and submit-and-wait for signed payments
 *
 * Non-capabilities:
 * - No signing; the wallet stays with the Responder
 * - No reconnection; a dropped socket fails the feed and the
 *   ConnectionManager opens a fresh session. close() always disconnects
 *   so the client's own reconnect timer is cleared.
 */

import { Client as XrplClient } from "xrpl";
import type { AccountTxRequest, Payment, TrustSet } from "xrpl";
import type { Logger } from "pino";
import type { AccountAddress, Endpoint, IncomingTransaction } from "@pft-node/types";
import { isRecord } from "@pft-node/types";
import { FeedQueue } from "../feed.js";
import { TransientStreamError } from "../errors.js";
import type {
  AccountHistoryPage,
  AccountHistoryQuery,
  LiveSession,
  SubmissionOutcome,
  TransactionFeed,
  TrustLine,
} from "../session.js";
import { normalizeTransaction } from "./normalize.js";

export interface XrplSessionOptions {
  /** Per-request timeout in ms. Default: 20000 */
  readonly requestTimeoutMs?: number;

  /** WebSocket handshake timeout in ms. Default: 10000 */
  readonly connectTimeoutMs?: number;

  /** Receives client `error` events */
  readonly logger?: Logger | undefined;
}

export class XrplSession implements LiveSession {
  readonly endpoint: Endpoint;
  private readonly client: XrplClient;
  private readonly logger: Logger | undefined;
  private readonly feeds = new Set<FeedQueue<IncomingTransaction>>();
  private closing = false;

  constructor(endpoint: Endpoint, client: XrplClient, logger?: Logger) {
    this.endpoint = endpoint;
    this.client = client;
    this.logger = logger;

    // An unhandled `error` event would crash the process
    this.client.on("error", (...details: unknown[]) => {
      this.logger?.warn(
        { endpoint: endpoint.url, details: details.map((d) => String(d)) },
        "Ledger client error",
      );
    });
  }

  /**
   * Connect to `endpoint` and wrap the client.
   */
  static async open(
    endpoint: Endpoint,
    options: XrplSessionOptions = {},
  ): Promise<XrplSession> {
    const client = new XrplClient(endpoint.url, {
      timeout: options.requestTimeoutMs ?? 20_000,
      connectionTimeout: options.connectTimeoutMs ?? 10_000,
    });
    const session = new XrplSession(endpoint, client, options.logger);
    try {
      await client.connect();
    } catch (err: unknown) {
      await session.close();
      throw err;
    }
    return session;
  }

  async subscribe(account: AccountAddress): Promise<TransactionFeed> {
    const feed = new FeedQueue<IncomingTransaction>();

    const onTransaction = (event: unknown): void => {
      const tx = normalizeTransaction(event);
      if (tx !== null) {
        feed.push(tx);
      }
    };

    const onDisconnected = (code: number): void => {
      detach();
      if (this.closing) {
        feed.end();
      } else {
        feed.fail(
          new TransientStreamError(this.endpoint.url, `socket closed with code ${code}`),
        );
      }
    };

    const detach = (): void => {
      this.client.removeListener("transaction", onTransaction);
      this.client.removeListener("disconnected", onDisconnected);
      this.feeds.delete(feed);
    };

    this.client.on("transaction", onTransaction);
    this.client.on("disconnected", onDisconnected);
    this.feeds.add(feed);

    try {
      await this.client.request({ command: "subscribe", accounts: [account] });
    } catch (err: unknown) {
      detach();
      throw err;
    }

    return feed;
  }

  async accountTransactions(query: AccountHistoryQuery): Promise<AccountHistoryPage> {
    const request: AccountTxRequest = {
      command: "account_tx",
      account: query.account,
      ledger_index_min: query.ledgerIndexMin ?? -1,
      ledger_index_max: query.ledgerIndexMax ?? -1,
      limit: query.limit ?? 200,
      forward: query.forward ?? false,
    };
    if (query.marker !== undefined) {
      request.marker = query.marker;
    }

    const response = await this.client.request(request);

    const transactions: IncomingTransaction[] = [];
    for (const entry of response.result.transactions) {
      const tx = normalizeTransaction(entry);
      if (tx !== null) {
        transactions.push(tx);
      }
    }

    const marker: unknown = response.result.marker;
    return marker !== undefined && marker !== null
      ? { transactions, marker }
      : { transactions };
  }

  async validatedLedgerIndex(): Promise<number> {
    return this.client.getLedgerIndex();
  }

  async trustLines(account: AccountAddress, peer: AccountAddress): Promise<readonly TrustLine[]> {
    const response = await this.client.request({
      command: "account_lines",
      account,
      peer,
      ledger_index: "validated",
    });

    return response.result.lines.map((line) => ({
      currency: line.currency,
      peer: line.account,
      limit: line.limit,
      balance: line.balance,
    }));
  }

  async autofill<T extends Payment | TrustSet>(transaction: T): Promise<T> {
    return this.client.autofill(transaction);
  }

  async submitAndWait(txBlob: string): Promise<SubmissionOutcome> {
    const response = await this.client.submitAndWait(txBlob);
    return toSubmissionOutcome(response.result);
  }

  isConnected(): boolean {
    return !this.closing && this.client.isConnected();
  }

  /**
   * Close the socket. Open feeds end normally.
   *
   * Disconnects even when the socket already dropped: xrpl.js schedules
   * its own reconnect after an unexpected close, and only disconnect()
   * cancels it.
   */
  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    try {
      await this.client.disconnect();
    } finally {
      for (const feed of this.feeds) {
        feed.end();
      }
      this.feeds.clear();
    }
  }
}

/**
 * Read the fields the node needs from a `tx` response result.
 */
export function toSubmissionOutcome(result: unknown): SubmissionOutcome {
  if (!isRecord(result)) {
    throw new Error("submitAndWait returned no result");
  }

  const hash = typeof result.hash === "string" ? result.hash : "";
  const meta = result.meta;
  const engineResult =
    isRecord(meta) && typeof meta.TransactionResult === "string"
      ? meta.TransactionResult
      : typeof meta === "string"
        ? meta
        : "unknown";
  const ledgerIndex =
    typeof result.ledger_index === "number" ? result.ledger_index : 0;

  return {
    hash,
    ledgerIndex,
    engineResult,
    validated: result.validated === true,
  };
}
