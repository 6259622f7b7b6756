/**
 * Tests for the JSONL-backed BookStore.
 *
 * Covers:
 * - Persistence across instances
 * - One line per committed transaction, none for rollbacks
 * - Torn and malformed lines skipped on load
 * - Write failures abort the commit
 */

import { describe, it, expect, beforeEach } from "vitest";
import { appendFileSync, mkdtempSync, mkdirSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Expense } from "@stockbook/types";
import { JsonlBookStore } from "../src/jsonl-book-store.js";
import { StockLedger } from "../src/stock-ledger.js";

const TS = "2024-01-15T10:00:00.000Z";

const EXPENSE: Expense = {
  id: "expense-1",
  purchasedAt: TS,
  amount: { amount: "45000", currency: "CLP", decimals: 0 },
  paymentMethodId: 2,
  supplierId: 1,
  expenseTypeId: 2,
  categoryId: 1,
  productId: 1,
  purchasedQuantity: "50",
};

function readLines(filePath: string): string[] {
  return readFileSync(filePath, "utf-8").split("\n").filter((l) => l.length > 0);
}

describe("JsonlBookStore", () => {
  let filePath: string;

  beforeEach(() => {
    const dir = mkdtempSync(join(tmpdir(), "stockbook-ledger-"));
    filePath = join(dir, "nested", "books.jsonl");
  });

  it("restores levels, movements and expenses from disk", async () => {
    const store = new JsonlBookStore({ filePath });
    const ledger = new StockLedger({ store, clock: () => TS });

    await store.transaction(async (tx) => {
      tx.appendExpense(EXPENSE);
      await ledger.applyInbound(1, "50", { tx, sourceId: EXPENSE.id });
    });
    await ledger.applyOutbound(1, "2.5");

    const reopened = new JsonlBookStore({ filePath });
    expect(reopened.getLevel(1)).toEqual({ productId: 1, quantity: "47.5", updatedAt: TS });
    expect(reopened.listMovements(1)).toHaveLength(2);
    expect(reopened.getExpense("expense-1")).toEqual(EXPENSE);
    expect(new StockLedger({ store: reopened }).verifyLevels().valid).toBe(true);
  });

  it("writes one line per committed transaction", async () => {
    const store = new JsonlBookStore({ filePath });
    const ledger = new StockLedger({ store });

    await ledger.applyInbound(1, "1");
    await ledger.applyInbound(1, "1");
    await expect(
      store.transaction(async (tx) => {
        await ledger.applyInbound(1, "1", { tx });
        throw new Error("rolled back");
      }),
    ).rejects.toThrow("rolled back");

    expect(readLines(filePath)).toHaveLength(2);
    expect(store.getLevel(1)?.quantity).toBe("2");
  });

  it("does not write empty transactions", async () => {
    const store = new JsonlBookStore({ filePath });
    await store.transaction(async () => "nothing");
    const reopened = new JsonlBookStore({ filePath });
    expect(reopened.listLevels()).toHaveLength(0);
    expect(reopened.skippedLines).toBe(0);
  });

  it("skips a torn trailing line", async () => {
    const store = new JsonlBookStore({ filePath });
    await new StockLedger({ store }).applyInbound(3, "10");
    appendFileSync(filePath, '{"txId":"t-2","committedAt":"2024-01-1');

    const reopened = new JsonlBookStore({ filePath });
    expect(reopened.skippedLines).toBe(1);
    expect(reopened.getLevel(3)?.quantity).toBe("10");
  });

  it("skips lines with an invalid shape", async () => {
    const store = new JsonlBookStore({ filePath });
    await new StockLedger({ store }).applyInbound(3, "10");
    appendFileSync(filePath, JSON.stringify({ txId: "t-2", committedAt: TS, changes: { levels: "x" } }) + "\n");

    const reopened = new JsonlBookStore({ filePath });
    expect(reopened.skippedLines).toBe(1);
    expect(reopened.listMovements()).toHaveLength(1);
  });

  it("aborts the commit with STORE_FAILURE when the file cannot be written", async () => {
    const store = new JsonlBookStore({ filePath });
    // A directory where the file should be makes every append fail
    mkdirSync(filePath);

    const ledger = new StockLedger({ store });
    await expect(ledger.applyInbound(1, "5")).rejects.toMatchObject({ code: "STORE_FAILURE" });
    expect(store.getLevel(1)).toBeUndefined();
    expect(store.listMovements()).toHaveLength(0);
  });
});
