/**
 * @pft-node/types — Shared domain types for the PFT memo node.
 *
 * Used across every package:
 * - Observed payments and their memos
 * - Candidate endpoints
 * - Dedup records, analysis results and reply payments
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards are the only runtime code
 */

export type {
  TxHash,
  AccountAddress,
  AssetRef,
  DecodedMemo,
  IncomingTransaction,
  EndpointLabel,
  Endpoint,
  DedupRecord,
  AnalysisResult,
  OutgoingTransaction,
} from "./ledger.js";

export { isRecord, isDedupRecord } from "./guards.js";
