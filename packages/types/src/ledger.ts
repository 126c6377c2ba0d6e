/**
 * Ledger Types
 *
 * Primitives for observing and answering XRP Ledger payments.
 *
 * Rules:
 * - Every record is read-only once observed or created
 * - Amounts stay decimal strings; callers decide how to compare them
 * - Memo text is decoded UTF-8, never hex
 */

/**
 * Transaction hash (64 hex characters on the XRP Ledger).
 */
export type TxHash = string;

/**
 * Classic r-address of an account.
 */
export type AccountAddress = string;

/**
 * The asset a payment moved.
 *
 * XRP has no issuer. Issued tokens are identified by currency code + issuer.
 */
export interface AssetRef {
  /** Currency code as it should be compared (decoded if non-standard) */
  readonly currency: string;

  /** Issuer r-address (absent for XRP) */
  readonly issuer?: AccountAddress;
}

/**
 * A memo decoded from its hex wire form.
 */
export interface DecodedMemo {
  readonly type?: string;
  readonly format?: string;
  readonly data: string;
}

/**
 * A payment observed on the ledger, from the live feed or account history.
 * Identity is `id`.
 */
export interface IncomingTransaction {
  /** Network-assigned transaction hash */
  readonly id: TxHash;

  readonly sender: AccountAddress;

  readonly destination: AccountAddress;

  readonly destinationTag?: number;

  /** Delivered amount as a decimal string (drops for XRP) */
  readonly amount: string;

  readonly asset: AssetRef;

  /** First memo with non-empty data */
  readonly memo?: string;

  /** Every memo on the transaction, in ledger order */
  readonly memos: readonly DecodedMemo[];

  /** Ledger the transaction was included in */
  readonly ledgerIndex: number;

  /** Whether the record comes from a validated ledger */
  readonly validated: boolean;

  /** Whether the engine result was tesSUCCESS */
  readonly succeeded: boolean;

  /** ISO 8601 close time of the ledger, when known */
  readonly executedAt?: string;
}

// =============================================================================
// Endpoints
// =============================================================================

export type EndpointLabel = "local" | "configured" | "public";

/**
 * A candidate WebSocket endpoint. Lower rank is tried first.
 */
export interface Endpoint {
  readonly url: string;
  readonly rank: number;
  readonly label: EndpointLabel;
}

// =============================================================================
// Responses
// =============================================================================

/**
 * Proof that an incoming transaction was answered.
 * At most one exists per `txId`.
 */
export interface DedupRecord {
  /** The incoming transaction that was answered */
  readonly txId: TxHash;

  /** The reply transaction hash */
  readonly responseTxId: TxHash;

  /** ISO 8601 timestamp of the successful submission */
  readonly answeredAt: string;
}

/**
 * Outcome of one call to the text-analysis service.
 */
export interface AnalysisResult<E = Error> {
  readonly sourceText: string;

  /** Produced text (empty when `success` is false) */
  readonly text: string;

  readonly success: boolean;

  readonly error?: E;
}

/**
 * A reply payment that was validated on the ledger.
 */
export interface OutgoingTransaction {
  readonly txHash: TxHash;
  readonly ledgerIndex: number;

  /** Sender of the incoming transaction */
  readonly destination: AccountAddress;

  readonly amount: string;
  readonly asset: AssetRef;

  /** Memo text as written on the ledger (after truncation) */
  readonly memo: string;

  /** The incoming transaction this answers */
  readonly inReplyTo: TxHash;

  readonly submittedAt: string;
}
