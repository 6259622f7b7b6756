/**
 * @stockbook/ledger — File-based JSONL BookStore.
 *
 * Stores one committed transaction per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each commit is a single append followed by fsync
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * {"txId":"...","committedAt":"...","changes":{"levels":[...],"movements":[...],"expenses":[...],"usage":[...]}}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import {
  isExpense,
  isStockLevel,
  isStockMovement,
  isUsageEvent,
} from "@stockbook/types";
import { InMemoryBookStore } from "./book-store.js";
import type { ChangeSet } from "./types.js";
import { LedgerError } from "./types.js";

export interface JsonlBookStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

interface JsonlRecord {
  readonly txId: string;
  readonly committedAt: string;
  readonly changes: ChangeSet;
}

export class JsonlBookStore extends InMemoryBookStore {
  private readonly _filePath: string;
  private _skippedLines = 0;

  /**
   * If the file exists, transactions are replayed from it.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlBookStoreOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Lines ignored on load because they were torn or malformed. */
  get skippedLines(): number {
    return this._skippedLines;
  }

  protected override persist(txId: string, changes: ChangeSet): void {
    const record: JsonlRecord = {
      txId,
      committedAt: new Date().toISOString(),
      changes,
    };

    let fd: number | undefined;
    try {
      fd = openSync(this._filePath, "a");
      appendFileSync(fd, JSON.stringify(record) + "\n", "utf-8");
      fsyncSync(fd);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new LedgerError("STORE_FAILURE", `Cannot persist transaction ${txId}: ${reason}`);
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn line from an unclean shutdown
        this._skippedLines++;
        continue;
      }

      if (!isJsonlRecord(parsed)) {
        this._skippedLines++;
        continue;
      }

      this.apply(parsed.changes);
    }
  }
}

function isChangeSet(value: unknown): value is ChangeSet {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    Array.isArray(v.levels) &&
    v.levels.every(isStockLevel) &&
    Array.isArray(v.movements) &&
    v.movements.every(isStockMovement) &&
    Array.isArray(v.expenses) &&
    v.expenses.every(isExpense) &&
    Array.isArray(v.usage) &&
    v.usage.every(isUsageEvent)
  );
}

function isJsonlRecord(value: unknown): value is JsonlRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.txId === "string" && typeof v.committedAt === "string" && isChangeSet(v.changes);
}
