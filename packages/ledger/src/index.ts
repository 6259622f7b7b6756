/**
 * @stockbook/ledger — Stock ledger with transactional book storage.
 *
 * Tracks the on-hand quantity of every product from inbound (purchase)
 * and outbound (usage) movements:
 * - A level always equals inbound minus outbound for its product
 * - Movements are append-only
 * - Mutations on one product are serialized, different products run freely
 * - All quantity arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - Writes become visible only when their transaction commits
 * - Fail-closed: invalid movements throw, never silently succeed
 */

// Core engine
export { StockLedger, isBelowMinimum } from "./stock-ledger.js";
export type { StockLedgerOptions } from "./stock-ledger.js";

// Storage
export { InMemoryBookStore } from "./book-store.js";
export { JsonlBookStore } from "./jsonl-book-store.js";
export type { JsonlBookStoreOptions } from "./jsonl-book-store.js";

// Concurrency
export { KeyedMutex } from "./keyed-mutex.js";
export type { Release } from "./keyed-mutex.js";

// Decimal arithmetic
export {
  QUANTITY_DECIMALS,
  parseDecimal,
  formatDecimal,
  parseQuantity,
  formatQuantity,
  normalizeQuantity,
  roundQuantity,
  addQuantity,
  subtractQuantity,
  compareQuantity,
  isPositiveQuantity,
  isPositiveMoney,
} from "./decimal-math.js";

// Types
export type {
  ChangeSet,
  UnitOfWork,
  BookStore,
  MovementOptions,
  LevelDiscrepancy,
  LevelVerification,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
