/**
 * Transaction Filter
 *
 * Decides whether an incoming transaction is a memo payment the node
 * should answer. Pure: no I/O, no state.
 */

import type { AccountAddress, IncomingTransaction } from "@pft-node/types";
import { decodeCurrencyCode } from "@pft-node/chain-observer";

export interface TokenCriteria {
  /** Currency code; long-form hex codes are decoded before comparison */
  readonly currency: string;

  /** Required issuer, when set */
  readonly issuer?: AccountAddress | undefined;
}

export interface FilterCriteria {
  readonly nodeAddress: AccountAddress;
  readonly token: TokenCriteria;
}

/**
 * The first check a transaction failed.
 */
export type RejectionReason =
  | "NOT_VALIDATED"
  | "NOT_SUCCEEDED"
  | "WRONG_DESTINATION"
  | "OWN_TRANSACTION"
  | "WRONG_CURRENCY"
  | "WRONG_ISSUER"
  | "NON_POSITIVE_AMOUNT"
  | "EMPTY_MEMO";

export class TransactionFilter {
  private readonly nodeAddress: AccountAddress;
  private readonly currency: string;
  private readonly issuer: AccountAddress | undefined;

  constructor(criteria: FilterCriteria) {
    this.nodeAddress = criteria.nodeAddress;
    this.currency = decodeCurrencyCode(criteria.token.currency);
    this.issuer = criteria.token.issuer;
  }

  isQualifying(tx: IncomingTransaction): boolean {
    return this.explain(tx) === null;
  }

  /**
   * @returns null when the transaction qualifies
   */
  explain(tx: IncomingTransaction): RejectionReason | null {
    if (!tx.validated) return "NOT_VALIDATED";
    if (!tx.succeeded) return "NOT_SUCCEEDED";
    if (tx.destination !== this.nodeAddress) return "WRONG_DESTINATION";
    if (tx.sender === this.nodeAddress) return "OWN_TRANSACTION";
    if (decodeCurrencyCode(tx.asset.currency) !== this.currency) return "WRONG_CURRENCY";
    if (this.issuer !== undefined && tx.asset.issuer !== this.issuer) return "WRONG_ISSUER";

    const amount = Number(tx.amount);
    if (tx.amount.trim() === "" || !Number.isFinite(amount) || amount <= 0) {
      return "NON_POSITIVE_AMOUNT";
    }

    if (tx.memo === undefined || tx.memo.trim() === "") return "EMPTY_MEMO";

    return null;
  }
}
