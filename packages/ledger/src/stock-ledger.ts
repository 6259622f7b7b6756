/**
 * @stockbook/ledger — Core StockLedger class.
 *
 * Keeps one StockLevel per product, always equal to the sum of its
 * inbound movements minus the sum of its outbound movements.
 *
 * API surface:
 * - applyInbound() — Add stock (purchase)
 * - applyOutbound() — Remove stock (usage)
 * - currentLevel() / getLevel() / listLevels() — Read levels
 * - movements() — The append-only movement trail
 * - verifyLevels() — Recompute every level from movements
 *
 * Mutations on the same product are serialized; the lock is held until
 * the surrounding transaction settles, so a read-modify-write inside a
 * recorder transaction cannot interleave with another one.
 */

import { randomUUID } from "node:crypto";
import type { Product, StockLevel, StockMovement, MovementDirection } from "@stockbook/types";
import { InMemoryBookStore } from "./book-store.js";
import { KeyedMutex } from "./keyed-mutex.js";
import {
  addQuantity,
  compareQuantity,
  formatQuantity,
  normalizeQuantity,
  parseQuantity,
  subtractQuantity,
} from "./decimal-math.js";
import type {
  BookStore,
  LevelDiscrepancy,
  LevelVerification,
  MovementOptions,
  UnitOfWork,
} from "./types.js";
import { LedgerError } from "./types.js";

export interface StockLedgerOptions {
  /** Backing store. Default: a fresh InMemoryBookStore. */
  readonly store?: BookStore | undefined;
  /** Whether a product id exists in the catalog. Default: any positive integer. */
  readonly isKnownProduct?: ((productId: number) => boolean) | undefined;
  /** Timestamp source (ISO 8601). */
  readonly clock?: (() => string) | undefined;
}

export class StockLedger {
  private readonly _store: BookStore;
  private readonly _isKnownProduct: (productId: number) => boolean;
  private readonly _clock: () => string;
  private readonly _locks = new KeyedMutex<number>();
  /** Product locks already held by each open transaction. */
  private readonly _held = new WeakMap<UnitOfWork, Set<number>>();

  constructor(options?: StockLedgerOptions) {
    this._store = options?.store ?? new InMemoryBookStore();
    this._isKnownProduct = options?.isKnownProduct ?? ((id) => Number.isInteger(id) && id > 0);
    this._clock = options?.clock ?? (() => new Date().toISOString());
  }

  get store(): BookStore {
    return this._store;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Add quantity to a product, creating its level on first use.
   *
   * Throws INVALID_QUANTITY unless quantity > 0,
   * INVALID_REFERENCE for a product the catalog does not know.
   */
  async applyInbound(productId: number, quantity: string, options?: MovementOptions): Promise<StockLevel> {
    return this._move("inbound", productId, quantity, options);
  }

  /**
   * Remove quantity from a product. The result may go negative.
   *
   * Throws INVALID_QUANTITY unless quantity > 0,
   * UNKNOWN_PRODUCT when the product has no level yet (none is created).
   */
  async applyOutbound(productId: number, quantity: string, options?: MovementOptions): Promise<StockLevel> {
    return this._move("outbound", productId, quantity, options);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Current quantity of a product. Throws UNKNOWN_PRODUCT if it has no level.
   */
  currentLevel(productId: number): string {
    const level = this._store.getLevel(productId);
    if (level === undefined) {
      throw new LedgerError("UNKNOWN_PRODUCT", `No stock level for product ${String(productId)}`);
    }
    return level.quantity;
  }

  getLevel(productId: number): StockLevel | undefined {
    return this._store.getLevel(productId);
  }

  listLevels(): readonly StockLevel[] {
    return this._store.listLevels();
  }

  movements(productId?: number): readonly StockMovement[] {
    return this._store.listMovements(productId);
  }

  /**
   * Recompute every level from the movement trail and compare.
   */
  verifyLevels(): LevelVerification {
    const expected = new Map<number, bigint>();
    for (const m of this._store.listMovements()) {
      const delta = parseQuantity(m.quantity);
      const prev = expected.get(m.productId) ?? 0n;
      expected.set(m.productId, m.direction === "inbound" ? prev + delta : prev - delta);
    }

    const levels = this._store.listLevels();
    const discrepancies: LevelDiscrepancy[] = [];

    for (const level of levels) {
      const sum = formatQuantity(expected.get(level.productId) ?? 0n);
      if (compareQuantity(level.quantity, sum) !== 0) {
        discrepancies.push({ productId: level.productId, recorded: level.quantity, expected: sum });
      }
      expected.delete(level.productId);
    }

    // Movements for a product that has no level row at all
    for (const [productId, sum] of expected) {
      discrepancies.push({ productId, recorded: "0", expected: formatQuantity(sum) });
    }

    return {
      valid: discrepancies.length === 0,
      checkedProducts: levels.length,
      discrepancies,
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private async _move(
    direction: MovementDirection,
    productId: number,
    quantity: string,
    options: MovementOptions | undefined,
  ): Promise<StockLevel> {
    if (!this._isKnownProduct(productId)) {
      throw new LedgerError("INVALID_REFERENCE", `Unknown product id ${String(productId)}`);
    }

    let normalized: string;
    try {
      normalized = normalizeQuantity(quantity);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new LedgerError("INVALID_QUANTITY", reason);
    }
    if (parseQuantity(normalized) <= 0n) {
      throw new LedgerError("INVALID_QUANTITY", `Quantity must be positive, got "${quantity}"`);
    }

    const timestamp = options?.timestamp ?? this._clock();
    const step = (tx: UnitOfWork): Promise<StockLevel> =>
      this._moveWithin(tx, direction, productId, normalized, timestamp, options?.sourceId);

    if (options?.tx !== undefined) {
      return step(options.tx);
    }
    return this._store.transaction(step);
  }

  private async _moveWithin(
    tx: UnitOfWork,
    direction: MovementDirection,
    productId: number,
    quantity: string,
    timestamp: string,
    sourceId: string | undefined,
  ): Promise<StockLevel> {
    await this._lockFor(tx, productId);

    const current = tx.getLevel(productId);
    if (current === undefined && direction === "outbound") {
      throw new LedgerError("UNKNOWN_PRODUCT", `No stock level for product ${String(productId)}`);
    }

    const base = current?.quantity ?? "0";
    const next = direction === "inbound" ? addQuantity(base, quantity) : subtractQuantity(base, quantity);
    const level: StockLevel = { productId, quantity: next, updatedAt: timestamp };

    tx.appendMovement({
      id: randomUUID(),
      productId,
      direction,
      quantity,
      ...(sourceId !== undefined ? { sourceId } : {}),
      timestamp,
    });
    tx.putLevel(level);

    return level;
  }

  /**
   * Take the product lock for the lifetime of tx (once per tx).
   */
  private async _lockFor(tx: UnitOfWork, productId: number): Promise<void> {
    let held = this._held.get(tx);
    if (held === undefined) {
      held = new Set();
      this._held.set(tx, held);
    }
    if (held.has(productId)) {
      return;
    }
    held.add(productId);

    const release = await this._locks.acquire(productId);
    tx.onSettled(release);
  }
}

/**
 * Whether a level sits strictly below the product's minimum stock.
 */
export function isBelowMinimum(level: StockLevel | string, product: Product): boolean {
  const quantity = typeof level === "string" ? level : level.quantity;
  return compareQuantity(quantity, product.minStock) < 0;
}
