/**
 * @stockbook/ledger — In-memory transactional BookStore.
 *
 * Each transaction stages its writes in a private change set. On commit
 * the change set is persisted (no-op here, a file append in
 * JsonlBookStore) and then applied in one synchronous step, so no
 * reader ever observes half a transaction.
 */

import { randomUUID } from "node:crypto";
import type {
  Expense,
  StockLevel,
  StockMovement,
  UsageEvent,
} from "@stockbook/types";
import type { BookStore, ChangeSet, UnitOfWork } from "./types.js";

// ─── Staged transaction ──────────────────────────────────────────────────

class StagedUnitOfWork implements UnitOfWork {
  readonly id: string = randomUUID();
  private readonly _levels = new Map<number, StockLevel>();
  private readonly _movements: StockMovement[] = [];
  private readonly _expenses: Expense[] = [];
  private readonly _usage: UsageEvent[] = [];
  private readonly _settled: (() => void)[] = [];
  private _open = true;

  constructor(private readonly _committed: BookStore) {}

  getLevel(productId: number): StockLevel | undefined {
    return this._levels.get(productId) ?? this._committed.getLevel(productId);
  }

  putLevel(level: StockLevel): void {
    this._assertOpen();
    this._levels.set(level.productId, level);
  }

  appendMovement(movement: StockMovement): void {
    this._assertOpen();
    this._movements.push(movement);
  }

  appendExpense(expense: Expense): void {
    this._assertOpen();
    this._expenses.push(expense);
  }

  appendUsage(event: UsageEvent): void {
    this._assertOpen();
    this._usage.push(event);
  }

  onSettled(callback: () => void): void {
    if (!this._open) {
      callback();
      return;
    }
    this._settled.push(callback);
  }

  changes(): ChangeSet {
    return {
      levels: [...this._levels.values()],
      movements: [...this._movements],
      expenses: [...this._expenses],
      usage: [...this._usage],
    };
  }

  settle(): void {
    this._open = false;
    for (const callback of this._settled.splice(0)) {
      callback();
    }
  }

  private _assertOpen(): void {
    if (!this._open) {
      throw new Error(`Transaction ${this.id} is already settled`);
    }
  }
}

function isEmpty(changes: ChangeSet): boolean {
  return (
    changes.levels.length === 0 &&
    changes.movements.length === 0 &&
    changes.expenses.length === 0 &&
    changes.usage.length === 0
  );
}

// ─── Store ───────────────────────────────────────────────────────────────

export class InMemoryBookStore implements BookStore {
  private readonly _levels = new Map<number, StockLevel>();
  private readonly _movements: StockMovement[] = [];
  private readonly _expenses = new Map<string, Expense>();
  private readonly _usage: UsageEvent[] = [];

  async transaction<T>(work: (tx: UnitOfWork) => Promise<T>): Promise<T> {
    const tx = new StagedUnitOfWork(this);
    try {
      const result = await work(tx);
      const changes = tx.changes();
      if (!isEmpty(changes)) {
        this.persist(tx.id, changes);
        this.apply(changes);
      }
      return result;
    } finally {
      tx.settle();
    }
  }

  getLevel(productId: number): StockLevel | undefined {
    return this._levels.get(productId);
  }

  listLevels(): readonly StockLevel[] {
    return [...this._levels.values()].sort((a, b) => a.productId - b.productId);
  }

  listMovements(productId?: number): readonly StockMovement[] {
    if (productId === undefined) {
      return [...this._movements];
    }
    return this._movements.filter((m) => m.productId === productId);
  }

  listExpenses(): readonly Expense[] {
    return [...this._expenses.values()];
  }

  getExpense(id: string): Expense | undefined {
    return this._expenses.get(id);
  }

  listUsage(): readonly UsageEvent[] {
    return [...this._usage];
  }

  // ─── Extension points ───────────────────────────────────────────────

  /**
   * Make a change set durable before it becomes visible.
   * Throwing here aborts the commit.
   */
  protected persist(_txId: string, _changes: ChangeSet): void {
    // Memory only.
  }

  /**
   * Apply a committed change set to the in-memory view.
   */
  protected apply(changes: ChangeSet): void {
    for (const level of changes.levels) {
      this._levels.set(level.productId, level);
    }
    this._movements.push(...changes.movements);
    for (const expense of changes.expenses) {
      this._expenses.set(expense.id, expense);
    }
    this._usage.push(...changes.usage);
  }
}
