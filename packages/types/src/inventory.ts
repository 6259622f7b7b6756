/**
 * Inventory Types
 *
 * Product catalog and stock bookkeeping.
 *
 * Rules:
 * - Quantities are decimal strings (never floats)
 * - A stock level always equals inbound minus outbound movements
 * - Movements are append-only
 */

/**
 * A simple named lookup row (expense type, category, payment method, supplier).
 */
export interface ReferenceEntry {
  /** Positive integer, assigned in insertion order */
  readonly id: number;
  readonly name: string;
  readonly description?: string | undefined;
}

/**
 * A catalog product that can be stocked.
 */
export interface Product {
  readonly id: number;

  /** Unique product name (e.g. "Harina") */
  readonly name: string;

  /** Unit of measure (e.g. "kg", "litro", "unidad") */
  readonly unit: string;

  /** Minimum stock threshold, decimal string */
  readonly minStock: string;

  readonly categoryId: number;
}

/**
 * Current on-hand quantity of one product.
 * Exactly one row per product once the first inbound movement lands.
 */
export interface StockLevel {
  readonly productId: number;

  /** Decimal string; may be negative (no floor is enforced) */
  readonly quantity: string;

  /** ISO 8601 timestamp of the last movement */
  readonly updatedAt: string;
}

/**
 * Direction of a stock movement.
 */
export type MovementDirection = "inbound" | "outbound";

/**
 * A single change to a product's quantity.
 */
export interface StockMovement {
  readonly id: string;
  readonly productId: number;
  readonly direction: MovementDirection;

  /** Strictly positive decimal string */
  readonly quantity: string;

  /** Expense or usage event that caused this movement */
  readonly sourceId?: string | undefined;

  readonly timestamp: string;
}
