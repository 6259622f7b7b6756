/**
 * Runtime Type Guards
 *
 * Narrowing functions for Stockbook domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, persisted files).
 */

import type { Money, Expense, UsageEvent } from "./financial.js";
import type { Product, ReferenceEntry, StockLevel, StockMovement, MovementDirection } from "./inventory.js";
import type { ActionKind, ActionParse, ParseKind } from "./action.js";

// =============================================================================
// Helpers
// =============================================================================

const DECIMAL = /^-?\d+(\.\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isPositiveId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL.test(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

// =============================================================================
// Financial guards
// =============================================================================

export function isMoney(value: unknown): value is Money {
  if (!isRecord(value)) return false;
  return (
    isDecimalString(value.amount) &&
    typeof value.currency === "string" &&
    value.currency.length > 0 &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

export function isExpense(value: unknown): value is Expense {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    typeof value.purchasedAt === "string" &&
    isMoney(value.amount) &&
    isPositiveId(value.paymentMethodId) &&
    isPositiveId(value.supplierId) &&
    isPositiveId(value.expenseTypeId) &&
    isPositiveId(value.categoryId) &&
    (value.productId === undefined || isPositiveId(value.productId)) &&
    (value.purchasedQuantity === undefined || isDecimalString(value.purchasedQuantity)) &&
    isOptionalString(value.itemDescription) &&
    isOptionalString(value.notes)
  );
}

export function isUsageEvent(value: unknown): value is UsageEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    typeof value.occurredAt === "string" &&
    isPositiveId(value.productId) &&
    isDecimalString(value.quantity) &&
    isOptionalString(value.reason)
  );
}

// =============================================================================
// Inventory guards
// =============================================================================

const DIRECTIONS = new Set<string>(["inbound", "outbound"]);

export function isReferenceEntry(value: unknown): value is ReferenceEntry {
  if (!isRecord(value)) return false;
  return (
    isPositiveId(value.id) &&
    typeof value.name === "string" &&
    value.name.trim().length > 0 &&
    isOptionalString(value.description)
  );
}

export function isProduct(value: unknown): value is Product {
  if (!isRecord(value)) return false;
  return (
    isPositiveId(value.id) &&
    typeof value.name === "string" &&
    value.name.trim().length > 0 &&
    typeof value.unit === "string" &&
    isDecimalString(value.minStock) &&
    isPositiveId(value.categoryId)
  );
}

export function isStockLevel(value: unknown): value is StockLevel {
  if (!isRecord(value)) return false;
  return (
    isPositiveId(value.productId) &&
    isDecimalString(value.quantity) &&
    typeof value.updatedAt === "string"
  );
}

export function isMovementDirection(value: unknown): value is MovementDirection {
  return typeof value === "string" && DIRECTIONS.has(value);
}

export function isStockMovement(value: unknown): value is StockMovement {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    isPositiveId(value.productId) &&
    isMovementDirection(value.direction) &&
    isDecimalString(value.quantity) &&
    isOptionalString(value.sourceId) &&
    typeof value.timestamp === "string"
  );
}

// =============================================================================
// Action guards
// =============================================================================

const ACTION_KINDS = new Set<string>([
  "register_purchase", "register_expense", "register_usage", "query_stock",
]);

const PARSE_KINDS = new Set<string>([...ACTION_KINDS, "supplement", "cancel", "unknown"]);

export function isActionKind(value: unknown): value is ActionKind {
  return typeof value === "string" && ACTION_KINDS.has(value);
}

export function isParseKind(value: unknown): value is ParseKind {
  return typeof value === "string" && PARSE_KINDS.has(value);
}

export function isActionParse(value: unknown): value is ActionParse {
  if (!isRecord(value)) return false;
  if (!isParseKind(value.actionKind)) return false;
  if (typeof value.originalText !== "string") return false;
  if (value.confidence !== undefined && typeof value.confidence !== "number") return false;
  if (!isRecord(value.fields)) return false;
  return Object.values(value.fields).every(
    (v) => v === undefined || v === null || typeof v === "string" || typeof v === "number",
  );
}
