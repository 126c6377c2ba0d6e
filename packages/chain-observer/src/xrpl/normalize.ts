/**
 * XRPL record normalization.
 *
 * Turns raw `transaction` stream messages and `account_tx` entries into
 * IncomingTransaction records. Accepts both API v1 (`transaction`, `tx`)
 * and API v2 (`tx_json`, top-level `hash`) shapes.
 *
 * Only Payments are normalized; everything else yields null.
 *
 * XRPL-specific notes:
 * - XRP amounts are strings in drops; issued amounts are objects
 * - `meta.delivered_amount` beats `DeliverMax`/`Amount` (partial payments)
 * - `date` is seconds since the Ripple epoch (2000-01-01)
 */

import type { AssetRef, DecodedMemo, IncomingTransaction } from "@pft-node/types";
import { isRecord } from "@pft-node/types";
import { decodeCurrencyCode } from "../currency.js";
import { fromHex, isHex } from "../hex.js";

const RIPPLE_EPOCH_OFFSET = 946684800;
const DROPS_PATTERN = /^\d+$/;

interface ParsedAmount {
  readonly amount: string;
  readonly asset: AssetRef;
}

export function normalizeTransaction(entry: unknown): IncomingTransaction | null {
  if (!isRecord(entry)) return null;

  const tx = firstRecord(entry.tx_json, entry.transaction, entry.tx);
  if (tx === undefined || tx.TransactionType !== "Payment") return null;

  const id = stringField(entry.hash) ?? stringField(tx.hash);
  const sender = stringField(tx.Account);
  const destination = stringField(tx.Destination);
  if (id === undefined || sender === undefined || destination === undefined) {
    return null;
  }

  const meta = firstRecord(entry.meta, entry.metaData);
  const parsed =
    parseAmount(meta?.delivered_amount) ??
    parseAmount(tx.DeliverMax) ??
    parseAmount(tx.Amount);
  if (parsed === undefined) return null;

  const memos = decodeMemos(tx.Memos);
  const memo = memos.find((m) => m.data.length > 0)?.data;
  const engineResult =
    stringField(meta?.TransactionResult) ?? stringField(entry.engine_result);
  const ledgerIndex =
    integerField(entry.ledger_index) ?? integerField(tx.ledger_index) ?? 0;
  const destinationTag = integerField(tx.DestinationTag);
  const date = integerField(tx.date) ?? integerField(entry.date);

  return {
    id,
    sender,
    destination,
    ...(destinationTag !== undefined ? { destinationTag } : {}),
    amount: parsed.amount,
    asset: parsed.asset,
    ...(memo !== undefined ? { memo } : {}),
    memos,
    ledgerIndex,
    validated: entry.validated === true,
    succeeded: engineResult === "tesSUCCESS",
    ...(date !== undefined
      ? { executedAt: new Date((date + RIPPLE_EPOCH_OFFSET) * 1000).toISOString() }
      : {}),
  };
}

/**
 * Decode the `Memos` array. Fields that are not valid hex are dropped;
 * a memo whose data is unreadable keeps an empty `data`.
 */
export function decodeMemos(raw: unknown): readonly DecodedMemo[] {
  if (!Array.isArray(raw)) return [];

  const memos: DecodedMemo[] = [];
  for (const wrapper of raw) {
    if (!isRecord(wrapper) || !isRecord(wrapper.Memo)) continue;
    const memo = wrapper.Memo;

    const type = decodeHexField(memo.MemoType);
    const format = decodeHexField(memo.MemoFormat);
    memos.push({
      ...(type !== undefined ? { type } : {}),
      ...(format !== undefined ? { format } : {}),
      data: decodeHexField(memo.MemoData) ?? "",
    });
  }
  return memos;
}

function parseAmount(raw: unknown): ParsedAmount | undefined {
  if (typeof raw === "string") {
    // "unavailable" appears on pre-2014 delivered_amount
    return DROPS_PATTERN.test(raw)
      ? { amount: raw, asset: { currency: "XRP" } }
      : undefined;
  }
  if (!isRecord(raw)) return undefined;

  const value = stringField(raw.value);
  const currency = stringField(raw.currency);
  const issuer = stringField(raw.issuer);
  if (value === undefined || currency === undefined) return undefined;

  return {
    amount: value,
    asset: {
      currency: decodeCurrencyCode(currency),
      ...(issuer !== undefined ? { issuer } : {}),
    },
  };
}

function decodeHexField(raw: unknown): string | undefined {
  if (typeof raw !== "string" || !isHex(raw)) return undefined;
  return fromHex(raw);
}

function firstRecord(...candidates: unknown[]): Record<string, unknown> | undefined {
  for (const candidate of candidates) {
    if (isRecord(candidate)) return candidate;
  }
  return undefined;
}

function stringField(raw: unknown): string | undefined {
  return typeof raw === "string" && raw !== "" ? raw : undefined;
}

function integerField(raw: unknown): number | undefined {
  return typeof raw === "number" && Number.isInteger(raw) ? raw : undefined;
}
