/**
 * Runtime Type Guards
 *
 * Narrowing for data that crosses a process boundary: raw ledger
 * responses and persisted dedup records.
 */

import type { DedupRecord } from "./ledger.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isDedupRecord(value: unknown): value is DedupRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.txId === "string" &&
    value.txId.length > 0 &&
    typeof value.responseTxId === "string" &&
    value.responseTxId.length > 0 &&
    typeof value.answeredAt === "string"
  );
}
