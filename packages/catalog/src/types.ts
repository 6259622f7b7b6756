/**
 * @stockbook/catalog — Types for the reference data store.
 *
 * Rules:
 * - Tables are fixed after construction (catalog growth is an
 *   administrative path outside this package)
 * - Resolution is pure and deterministic
 * - Fail-closed: an unresolvable name throws, never guesses below threshold
 */

// ─── Entity Classes ─────────────────────────────────────────────────────

/** Lookup tables a free-text name can be resolved against. */
export type EntityClass =
  | "expenseType"
  | "category"
  | "paymentMethod"
  | "supplier"
  | "product";

export const ENTITY_CLASSES: readonly EntityClass[] = [
  "expenseType",
  "category",
  "paymentMethod",
  "supplier",
  "product",
] as const;

// ─── Matching ───────────────────────────────────────────────────────────

/**
 * A scored candidate from fuzzy matching.
 */
export interface MatchResult {
  readonly id: number;
  readonly name: string;
  /** Similarity in [0, 1]; 1 only for an exact normalized match */
  readonly score: number;
  readonly exact: boolean;
  /** Levenshtein distance between the normalized query and name */
  readonly distance: number;
}

export interface MatchOptions {
  /** Minimum similarity a candidate must reach. Default: 0.6 */
  readonly threshold?: number | undefined;
}

// ─── Seed ───────────────────────────────────────────────────────────────

export interface SeedEntry {
  readonly name: string;
  readonly description?: string | undefined;
}

export interface SeedProduct {
  readonly name: string;
  readonly unit: string;
  readonly minStock: string;
  /** Category name; must exist in `categories` */
  readonly category: string;
}

/**
 * Initial content of every lookup table.
 * Ids are assigned in array order, starting at 1.
 */
export interface CatalogSeed {
  readonly expenseTypes: readonly SeedEntry[];
  readonly categories: readonly SeedEntry[];
  readonly paymentMethods: readonly SeedEntry[];
  readonly suppliers: readonly SeedEntry[];
  readonly products: readonly SeedProduct[];
}

// ─── Errors ─────────────────────────────────────────────────────────────

export type CatalogErrorCode =
  | "NOT_FOUND"
  | "UNKNOWN_ID"
  | "DUPLICATE_NAME"
  | "INVALID_SEED";

/**
 * Structured error from the catalog.
 */
export class CatalogError extends Error {
  public readonly code: CatalogErrorCode;
  public readonly entityClass: EntityClass | undefined;

  constructor(code: CatalogErrorCode, message: string, entityClass?: EntityClass) {
    super(message);
    this.name = "CatalogError";
    this.code = code;
    this.entityClass = entityClass;
  }
}
