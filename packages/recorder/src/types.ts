/**
 * @stockbook/recorder — Types for the transaction recorder.
 */

import type { EntityClass } from "@stockbook/catalog";
import type { Expense, Money, StockLevel, UsageEvent } from "@stockbook/types";

// ─── Inputs ──────────────────────────────────────────────────────────────

/**
 * A purchase or generic expense to record.
 *
 * productId and purchasedQuantity come together or not at all;
 * itemDescription is only for expenses that involve no product.
 */
export interface ExpenseInput {
  readonly amount: Money;
  readonly paymentMethodId: number;
  readonly supplierId: number;
  readonly expenseTypeId: number;
  readonly categoryId: number;
  readonly productId?: number | undefined;
  readonly purchasedQuantity?: string | undefined;
  readonly itemDescription?: string | undefined;
  readonly notes?: string | undefined;
  /** Default: clock */
  readonly purchasedAt?: string | undefined;
}

export interface UsageInput {
  readonly productId: number;
  readonly quantity: string;
  /** Default: "Uso" */
  readonly reason?: string | undefined;
  /** Default: clock */
  readonly occurredAt?: string | undefined;
}

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * A committed record together with the stock level it produced, if any.
 */
export interface Recorded<T> {
  readonly record: T;
  readonly level?: StockLevel | undefined;
}

export type RecordedExpense = Recorded<Expense>;
export type RecordedUsage = Recorded<UsageEvent> & { readonly level: StockLevel };

// ─── Collaborators ───────────────────────────────────────────────────────

/**
 * Id existence check over the reference tables. Catalog satisfies it.
 */
export interface ReferenceDirectory {
  has(entityClass: EntityClass, id: number): boolean;
}

/**
 * Structured log sink (pino-compatible subset).
 */
export interface RecorderLogger {
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type RecorderErrorCode =
  | "VALIDATION_FAILED"
  | "INVALID_REFERENCE"
  | "UNKNOWN_PRODUCT"
  | "RECORDING_FAILED";

export class RecorderError extends Error {
  public readonly code: RecorderErrorCode;

  constructor(code: RecorderErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecorderError";
    this.code = code;
  }
}
