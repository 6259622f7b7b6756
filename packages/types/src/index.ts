/**
 * @stockbook/types — Shared domain types for the Stockbook stack.
 *
 * These types are used across all Stockbook packages:
 * - Financial records (Money, expenses, usage events)
 * - Inventory (products, reference rows, stock levels, movements)
 * - Structured chat actions
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  Currency,
  Expense,
  UsageEvent,
} from "./financial.js";

// Inventory types
export type {
  ReferenceEntry,
  Product,
  StockLevel,
  StockMovement,
  MovementDirection,
} from "./inventory.js";

// Action types
export type {
  ActionKind,
  ParseKind,
  FieldName,
  RawFieldValue,
  ActionParse,
} from "./action.js";

// Runtime type guards
export {
  isMoney,
  isExpense,
  isUsageEvent,
  isReferenceEntry,
  isProduct,
  isStockLevel,
  isMovementDirection,
  isStockMovement,
  isActionKind,
  isParseKind,
  isActionParse,
} from "./guards.js";
