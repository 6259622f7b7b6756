/**
 * Transaction Recorder — Persist expenses and usage against the stock ledger.
 *
 * Each record and the ledger movement it implies commit together in one
 * unit of work of the book store:
 * - recordExpense() — Expense row, plus an inbound movement for purchases
 * - recordUsage() — UsageEvent row plus an outbound movement
 *
 * Rules:
 * - Validation happens before anything is staged
 * - All-or-nothing: a failure at any step leaves no row and no movement
 * - Ledger reference errors keep their codes; other failures are RECORDING_FAILED
 */

import { randomUUID } from "node:crypto";
import type { EntityClass } from "@stockbook/catalog";
import {
  LedgerError,
  isPositiveMoney,
  normalizeQuantity,
  isPositiveQuantity,
} from "@stockbook/ledger";
import type { StockLedger, UnitOfWork } from "@stockbook/ledger";
import { isMoney } from "@stockbook/types";
import type { Expense, UsageEvent } from "@stockbook/types";
import type {
  ExpenseInput,
  RecordedExpense,
  RecordedUsage,
  RecorderLogger,
  ReferenceDirectory,
  UsageInput,
} from "./types.js";
import { RecorderError } from "./types.js";

/** Reason stored on usage events that carry none. */
export const DEFAULT_USAGE_REASON = "Uso";

export interface TransactionRecorderOptions {
  readonly ledger: StockLedger;
  readonly references: ReferenceDirectory;
  readonly clock?: (() => string) | undefined;
  readonly logger?: RecorderLogger | undefined;
}

// =============================================================================
// Transaction Recorder
// =============================================================================

export class TransactionRecorder {
  private readonly ledger: StockLedger;
  private readonly references: ReferenceDirectory;
  private readonly clock: () => string;
  private readonly logger: RecorderLogger | undefined;

  constructor(options: TransactionRecorderOptions) {
    this.ledger = options.ledger;
    this.references = options.references;
    this.clock = options.clock ?? (() => new Date().toISOString());
    this.logger = options.logger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recording
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record an expense. When it names a product, the purchased quantity
   * is added to stock in the same unit of work.
   */
  async recordExpense(input: ExpenseInput): Promise<RecordedExpense> {
    const expense = this.buildExpense(input);

    const level = await this.commit(async (tx) => {
      tx.appendExpense(expense);
      if (expense.productId === undefined || expense.purchasedQuantity === undefined) {
        return undefined;
      }
      return this.ledger.applyInbound(expense.productId, expense.purchasedQuantity, {
        tx,
        sourceId: expense.id,
        timestamp: expense.purchasedAt,
      });
    });

    this.logger?.info(
      { expenseId: expense.id, amount: expense.amount.amount, productId: expense.productId },
      "Expense recorded",
    );

    return level !== undefined ? { record: expense, level } : { record: expense };
  }

  /**
   * Record consumption of a product and remove it from stock.
   */
  async recordUsage(input: UsageInput): Promise<RecordedUsage> {
    const usage = this.buildUsage(input);

    const level = await this.commit(async (tx) => {
      tx.appendUsage(usage);
      return this.ledger.applyOutbound(usage.productId, usage.quantity, {
        tx,
        sourceId: usage.id,
        timestamp: usage.occurredAt,
      });
    });

    this.logger?.info(
      { usageId: usage.id, productId: usage.productId, quantity: usage.quantity, level: level.quantity },
      "Usage recorded",
    );

    return { record: usage, level };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getExpense(id: string): Expense | undefined {
    return this.ledger.store.getExpense(id);
  }

  listExpenses(): readonly Expense[] {
    return this.ledger.store.listExpenses();
  }

  listUsage(): readonly UsageEvent[] {
    return this.ledger.store.listUsage();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Validation rules (fail-closed, all must pass):
   * 1. Amount is well-formed Money and strictly positive
   * 2. Payment method, supplier, expense type and category exist
   * 3. Product and quantity come together or not at all
   * 4. The product exists and the quantity is positive
   * 5. No item description alongside a product
   */
  private buildExpense(input: ExpenseInput): Expense {
    // Rule 1
    if (!isMoney(input.amount) || !safePositiveMoney(input)) {
      throw new RecorderError(
        "VALIDATION_FAILED",
        `Expense amount must be positive, got "${String(input.amount.amount)}"`,
      );
    }

    // Rule 2
    this.assertReference("paymentMethod", input.paymentMethodId);
    this.assertReference("supplier", input.supplierId);
    this.assertReference("expenseType", input.expenseTypeId);
    this.assertReference("category", input.categoryId);

    // Rule 3
    const hasProduct = input.productId !== undefined;
    const hasQuantity = input.purchasedQuantity !== undefined;
    if (hasProduct !== hasQuantity) {
      throw new RecorderError(
        "VALIDATION_FAILED",
        "A purchased product and its quantity must be given together",
      );
    }

    // Rule 4
    let purchasedQuantity: string | undefined;
    if (input.productId !== undefined && input.purchasedQuantity !== undefined) {
      this.assertReference("product", input.productId);
      purchasedQuantity = positiveQuantity(input.purchasedQuantity);
    }

    // Rule 5
    if (hasProduct && input.itemDescription !== undefined) {
      throw new RecorderError(
        "VALIDATION_FAILED",
        "An item description is only allowed when no product applies",
      );
    }

    return {
      id: randomUUID(),
      purchasedAt: input.purchasedAt ?? this.clock(),
      amount: input.amount,
      paymentMethodId: input.paymentMethodId,
      supplierId: input.supplierId,
      expenseTypeId: input.expenseTypeId,
      categoryId: input.categoryId,
      ...(input.productId !== undefined ? { productId: input.productId, purchasedQuantity } : {}),
      ...(input.itemDescription !== undefined ? { itemDescription: input.itemDescription } : {}),
      ...(input.notes !== undefined ? { notes: input.notes } : {}),
    };
  }

  private buildUsage(input: UsageInput): UsageEvent {
    this.assertReference("product", input.productId);
    const quantity = positiveQuantity(input.quantity);

    return {
      id: randomUUID(),
      occurredAt: input.occurredAt ?? this.clock(),
      productId: input.productId,
      quantity,
      reason: input.reason ?? DEFAULT_USAGE_REASON,
    };
  }

  private assertReference(entityClass: EntityClass, id: number): void {
    if (!this.references.has(entityClass, id)) {
      throw new RecorderError("INVALID_REFERENCE", `Unknown ${entityClass} id ${String(id)}`);
    }
  }

  private async commit<T>(work: (tx: UnitOfWork) => Promise<T>): Promise<T> {
    try {
      return await this.ledger.store.transaction(work);
    } catch (err: unknown) {
      const mapped = toRecorderError(err);
      this.logger?.warn({ code: mapped.code, err: mapped.message }, "Recording rolled back");
      throw mapped;
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function safePositiveMoney(input: ExpenseInput): boolean {
  try {
    return isPositiveMoney(input.amount);
  } catch {
    // Malformed amount (e.g. too many decimals)
    return false;
  }
}

function positiveQuantity(quantity: string): string {
  let normalized: string;
  try {
    normalized = normalizeQuantity(quantity);
  } catch (err: unknown) {
    throw new RecorderError("VALIDATION_FAILED", `Invalid quantity "${quantity}"`, { cause: err });
  }
  if (!isPositiveQuantity(normalized)) {
    throw new RecorderError("VALIDATION_FAILED", `Quantity must be positive, got "${quantity}"`);
  }
  return normalized;
}

/**
 * Map any failure inside a recording transaction to a RecorderError.
 */
export function toRecorderError(err: unknown): RecorderError {
  if (err instanceof RecorderError) {
    return err;
  }
  if (err instanceof LedgerError) {
    switch (err.code) {
      case "INVALID_REFERENCE":
      case "UNKNOWN_PRODUCT":
        return new RecorderError(err.code, err.message, { cause: err });
      case "INVALID_QUANTITY":
        return new RecorderError("VALIDATION_FAILED", err.message, { cause: err });
      case "STORE_FAILURE":
        return new RecorderError("RECORDING_FAILED", err.message, { cause: err });
    }
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new RecorderError("RECORDING_FAILED", `Recording failed: ${reason}`, { cause: err });
}
