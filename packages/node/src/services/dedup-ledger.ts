/**
 * Dedup Ledger
 *
 * Records which incoming transactions have been answered so each gets at
 * most one reply. An entry is written only after the reply validated and
 * is never changed afterwards.
 *
 * Persistence is pluggable:
 * - InMemoryDedupPersistence (default): state lasts for the process
 * - JsonlDedupPersistence: one JSON line per record, fsynced on append,
 *   torn lines skipped on load
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import type { AccountAddress, DedupRecord, TxHash } from "@pft-node/types";
import { isDedupRecord } from "@pft-node/types";
import type { LiveSession } from "@pft-node/chain-observer";
import { findReplyReference, isReplyMemo } from "@pft-node/responder";

// =============================================================================
// Errors
// =============================================================================

export type DedupErrorCode = "ALREADY_RECORDED" | "PERSISTENCE_FAILED";

export class DedupError extends Error {
  constructor(
    public readonly code: DedupErrorCode,
    message: string,
    public readonly txId: TxHash,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DedupError";
  }
}

// =============================================================================
// Persistence
// =============================================================================

export interface DedupPersistence {
  /** Every record stored so far, oldest first */
  load(): readonly DedupRecord[];

  /** Durably store one new record */
  append(record: DedupRecord): void;
}

export class InMemoryDedupPersistence implements DedupPersistence {
  private readonly _records: DedupRecord[] = [];

  load(): readonly DedupRecord[] {
    return [...this._records];
  }

  append(record: DedupRecord): void {
    this._records.push(record);
  }
}

export class JsonlDedupPersistence implements DedupPersistence {
  private readonly _filePath: string;

  constructor(filePath: string) {
    this._filePath = filePath;
    mkdirSync(dirname(filePath), { recursive: true });
  }

  get filePath(): string {
    return this._filePath;
  }

  /**
   * Read every valid line. Partial or corrupt lines (unclean shutdown)
   * are skipped.
   */
  load(): readonly DedupRecord[] {
    if (!existsSync(this._filePath)) {
      return [];
    }

    const records: DedupRecord[] = [];
    for (const line of readFileSync(this._filePath, "utf-8").split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn write
        continue;
      }
      if (isDedupRecord(parsed)) {
        records.push(parsed);
      }
    }
    return records;
  }

  append(record: DedupRecord): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, JSON.stringify(record) + "\n", "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

// =============================================================================
// Ledger
// =============================================================================

export class DedupLedger {
  private readonly _records = new Map<TxHash, DedupRecord>();
  private readonly _persistence: DedupPersistence;
  private readonly _now: () => Date;

  constructor(
    persistence: DedupPersistence = new InMemoryDedupPersistence(),
    now: () => Date = () => new Date(),
  ) {
    this._persistence = persistence;
    this._now = now;

    // First record for a txId wins
    for (const record of persistence.load()) {
      if (!this._records.has(record.txId)) {
        this._records.set(record.txId, record);
      }
    }
  }

  alreadyAnswered(txId: TxHash): boolean {
    return this._records.has(txId);
  }

  /**
   * Mark `txId` as answered by `responseTxId`.
   *
   * @throws DedupError ALREADY_RECORDED if `txId` already has a record
   * @throws DedupError PERSISTENCE_FAILED if the write did not complete
   */
  record(txId: TxHash, responseTxId: TxHash): DedupRecord {
    return this._commit({
      txId,
      responseTxId,
      answeredAt: this._now().toISOString(),
    });
  }

  get(txId: TxHash): DedupRecord | undefined {
    return this._records.get(txId);
  }

  get size(): number {
    return this._records.size;
  }

  records(): readonly DedupRecord[] {
    return [...this._records.values()];
  }

  /**
   * Recover answered ids from the node's own outgoing replies.
   *
   * Pages through account history newest first, up to `maxPages`, and
   * records the in-reply-to reference of every successful reply payment
   * sent by `nodeAddress`. A payment without the reply memo type is not a
   * reply, whatever its other memos say.
   *
   * @returns Number of records added
   */
  async rebuildFromHistory(
    session: LiveSession,
    nodeAddress: AccountAddress,
    maxPages: number,
  ): Promise<number> {
    let added = 0;
    let marker: unknown;

    for (let page = 0; page < maxPages; page++) {
      const result = await session.accountTransactions({
        account: nodeAddress,
        forward: false,
        ...(marker !== undefined ? { marker } : {}),
      });

      for (const tx of result.transactions) {
        if (tx.sender !== nodeAddress || !tx.validated || !tx.succeeded) continue;
        if (!isReplyMemo(tx.memos)) continue;

        const inReplyTo = findReplyReference(tx.memos);
        if (inReplyTo === undefined || this._records.has(inReplyTo)) continue;

        this._commit({
          txId: inReplyTo,
          responseTxId: tx.id,
          answeredAt: tx.executedAt ?? this._now().toISOString(),
        });
        added++;
      }

      marker = result.marker;
      if (marker === undefined) break;
    }

    return added;
  }

  private _commit(record: DedupRecord): DedupRecord {
    if (this._records.has(record.txId)) {
      throw new DedupError(
        "ALREADY_RECORDED",
        `Transaction ${record.txId} is already recorded as answered`,
        record.txId,
      );
    }

    // Persist before the in-memory update
    try {
      this._persistence.append(record);
    } catch (err: unknown) {
      throw new DedupError(
        "PERSISTENCE_FAILED",
        `Failed to persist dedup record for ${record.txId}`,
        record.txId,
        { cause: err },
      );
    }

    this._records.set(record.txId, record);
    return record;
  }
}
