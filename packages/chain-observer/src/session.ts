/**
 * Live Session
 *
 * The capability a connected ledger endpoint offers the rest of the node.
 * Exactly one session is live at a time; the monitor loop owns it and the
 * ConnectionManager replaces it wholesale on reconnect.
 *
 * Design rules:
 * - A feed ends normally only after an intentional close()
 * - An unexpected disconnect fails the feed with TransientStreamError
 * - Records buffered before a disconnect are still delivered
 */

import type { Payment, TrustSet } from "xrpl";
import type {
  AccountAddress,
  Endpoint,
  IncomingTransaction,
  TxHash,
} from "@pft-node/types";

/**
 * Normalized transactions touching the subscribed account.
 */
export type TransactionFeed = AsyncIterable<IncomingTransaction>;

/**
 * One page request against account history.
 */
export interface AccountHistoryQuery {
  readonly account: AccountAddress;

  /** Lowest ledger to include (-1 = earliest available) */
  readonly ledgerIndexMin?: number;

  /** Highest ledger to include (-1 = latest validated) */
  readonly ledgerIndexMax?: number;

  readonly limit?: number;

  /** Oldest first when true */
  readonly forward?: boolean;

  /** Opaque paging marker from the previous page */
  readonly marker?: unknown;
}

export interface AccountHistoryPage {
  /** Payments on the page, in the requested order; other types are dropped */
  readonly transactions: readonly IncomingTransaction[];

  /** Present when more pages follow */
  readonly marker?: unknown;
}

/**
 * Final state of a submitted transaction.
 */
export interface SubmissionOutcome {
  readonly hash: TxHash;
  readonly ledgerIndex: number;

  /** Engine result from the validated metadata (e.g. "tesSUCCESS") */
  readonly engineResult: string;

  readonly validated: boolean;
}

/**
 * One `account_lines` entry, seen from the querying account.
 */
export interface TrustLine {
  /** Currency code as the ledger reports it */
  readonly currency: string;
  readonly peer: AccountAddress;
  readonly limit: string;
  readonly balance: string;
}

export interface LiveSession {
  readonly endpoint: Endpoint;

  /**
   * Subscribe to validated transactions affecting `account`.
   */
  subscribe(account: AccountAddress): Promise<TransactionFeed>;

  accountTransactions(query: AccountHistoryQuery): Promise<AccountHistoryPage>;

  /**
   * Index of the latest validated ledger on this endpoint.
   */
  validatedLedgerIndex(): Promise<number>;

  /**
   * Trust lines `account` holds towards `peer`.
   */
  trustLines(account: AccountAddress, peer: AccountAddress): Promise<readonly TrustLine[]>;

  /**
   * Fill sequence, fee and LastLedgerSequence.
   */
  autofill<T extends Payment | TrustSet>(transaction: T): Promise<T>;

  /**
   * Submit a signed blob and wait until it is validated or expires.
   */
  submitAndWait(txBlob: string): Promise<SubmissionOutcome>;

  isConnected(): boolean;

  close(): Promise<void>;
}

/**
 * Opens a session against one endpoint.
 */
export type SessionFactory = (endpoint: Endpoint) => Promise<LiveSession>;
