/**
 * Financial Types
 *
 * Financial records of the business: purchases and generic expenses.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit
 * - Expenses are append-only by contract
 */

/**
 * Currency identifier (ISO 4217 code, e.g. "CLP").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "45000", "1990.50") */
  readonly amount: string;

  /** Currency code */
  readonly currency: Currency;

  /** Number of decimal places for this currency. CLP = 0, USD = 2. */
  readonly decimals: number;
}

/**
 * A recorded financial transaction.
 *
 * When `productId` is set, the expense is an inventory purchase and
 * `purchasedQuantity` is set as well. `itemDescription` is used exactly
 * when no catalog product applies.
 */
export interface Expense {
  /** Random UUID assigned at creation */
  readonly id: string;

  /** ISO 8601 timestamp of the purchase */
  readonly purchasedAt: string;

  /** Strictly positive amount */
  readonly amount: Money;

  readonly paymentMethodId: number;
  readonly supplierId: number;
  readonly expenseTypeId: number;
  readonly categoryId: number;

  readonly productId?: number | undefined;

  /** Decimal string, > 0 when present */
  readonly purchasedQuantity?: string | undefined;

  readonly itemDescription?: string | undefined;
  readonly notes?: string | undefined;
}

/**
 * Consumption of a product (stock outbound).
 */
export interface UsageEvent {
  readonly id: string;
  readonly occurredAt: string;
  readonly productId: number;

  /** Decimal string, > 0 */
  readonly quantity: string;

  readonly reason?: string | undefined;
}
