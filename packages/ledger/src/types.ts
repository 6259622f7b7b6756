/**
 * @stockbook/ledger — Internal types for the stock ledger.
 *
 * These extend the shared @stockbook/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Nothing becomes visible before its transaction commits
 * - Fail-closed: invalid movements throw, never silently succeed
 */

import type {
  Expense,
  StockLevel,
  StockMovement,
  UsageEvent,
} from "@stockbook/types";

// ─── Unit of Work ────────────────────────────────────────────────────────

/**
 * Writes staged by one transaction. Applied all-or-nothing on commit.
 */
export interface ChangeSet {
  readonly levels: readonly StockLevel[];
  readonly movements: readonly StockMovement[];
  readonly expenses: readonly Expense[];
  readonly usage: readonly UsageEvent[];
}

/**
 * A transaction in progress.
 *
 * Reads see the transaction's own staged writes on top of committed
 * state. Writes stay invisible to everyone else until commit.
 */
export interface UnitOfWork {
  readonly id: string;
  getLevel(productId: number): StockLevel | undefined;
  putLevel(level: StockLevel): void;
  appendMovement(movement: StockMovement): void;
  appendExpense(expense: Expense): void;
  appendUsage(event: UsageEvent): void;
  /** Run once after commit or rollback, in registration order. */
  onSettled(callback: () => void): void;
}

/**
 * Transactional storage for levels, movements, expenses and usage.
 */
export interface BookStore {
  /**
   * Run work inside a transaction. Commits when work resolves,
   * discards every staged write when it throws.
   */
  transaction<T>(work: (tx: UnitOfWork) => Promise<T>): Promise<T>;
  getLevel(productId: number): StockLevel | undefined;
  listLevels(): readonly StockLevel[];
  listMovements(productId?: number): readonly StockMovement[];
  listExpenses(): readonly Expense[];
  getExpense(id: string): Expense | undefined;
  listUsage(): readonly UsageEvent[];
}

// ─── Ledger Types ────────────────────────────────────────────────────────

/**
 * Options shared by inbound and outbound movements.
 */
export interface MovementOptions {
  /** Join an outer transaction instead of opening one. */
  readonly tx?: UnitOfWork | undefined;
  /** Expense or usage record that caused the movement. */
  readonly sourceId?: string | undefined;
  /** Override timestamp (ISO 8601). Default: clock. */
  readonly timestamp?: string | undefined;
}

/**
 * A product whose recorded level differs from its movement sum.
 */
export interface LevelDiscrepancy {
  readonly productId: number;
  readonly recorded: string;
  readonly expected: string;
}

export interface LevelVerification {
  readonly valid: boolean;
  readonly checkedProducts: number;
  readonly discrepancies: readonly LevelDiscrepancy[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_QUANTITY"
  | "INVALID_REFERENCE"
  | "UNKNOWN_PRODUCT"
  | "STORE_FAILURE";

/**
 * Structured error for ledger operations.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
