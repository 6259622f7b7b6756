/**
 * @stockbook/catalog — Reference data store.
 *
 * Holds the lookup tables (expense types, categories, payment methods,
 * suppliers, products) and resolves free-text names to their ids.
 *
 * API surface:
 * - resolve() — name → id, throws NOT_FOUND below threshold
 * - match() — name → scored match, or undefined
 * - resolveProduct() — name → full Product
 * - get() / list() / productById() — id lookups
 * - fromSeed() / loadSeedFile() / loadDefaultSeed() — construction
 *
 * There is NO insert(), update(), or delete(). Resolution never mutates.
 */

import { readFileSync } from "node:fs";
import type { Product, ReferenceEntry } from "@stockbook/types";
import { findBestMatch, DEFAULT_MATCH_THRESHOLD } from "./fuzzy-match.js";
import { normalizeName } from "./fuzzy-match.js";
import type {
  CatalogSeed,
  EntityClass,
  MatchResult,
  SeedEntry,
  SeedProduct,
} from "./types.js";
import { CatalogError } from "./types.js";

export interface CatalogOptions {
  /** Minimum similarity for resolution. Default: 0.6 */
  readonly threshold?: number | undefined;
}

const DEFAULT_SEED_URL = new URL("../data/seed.json", import.meta.url);

/**
 * Immutable reference tables with fuzzy name resolution.
 */
export class Catalog {
  private readonly _tables: ReadonlyMap<EntityClass, readonly ReferenceEntry[]>;
  private readonly _products: readonly Product[];
  private readonly _threshold: number;

  private constructor(
    tables: ReadonlyMap<EntityClass, readonly ReferenceEntry[]>,
    products: readonly Product[],
    options?: CatalogOptions,
  ) {
    this._tables = tables;
    this._products = products;
    this._threshold = options?.threshold ?? DEFAULT_MATCH_THRESHOLD;
  }

  // ─── Construction ────────────────────────────────────────────────────

  /**
   * Build a catalog from seed tables. Ids follow array order, from 1.
   * Throws INVALID_SEED on blank names or unknown product categories,
   * DUPLICATE_NAME when two rows normalize to the same name.
   */
  static fromSeed(seed: CatalogSeed, options?: CatalogOptions): Catalog {
    const tables = new Map<EntityClass, readonly ReferenceEntry[]>([
      ["expenseType", buildTable("expenseType", seed.expenseTypes)],
      ["category", buildTable("category", seed.categories)],
      ["paymentMethod", buildTable("paymentMethod", seed.paymentMethods)],
      ["supplier", buildTable("supplier", seed.suppliers)],
    ]);

    const categories = tables.get("category") ?? [];
    const products = buildProducts(seed.products, categories);

    return new Catalog(tables, products, options);
  }

  /**
   * Read and validate a JSON seed file.
   */
  static loadSeedFile(path: string | URL, options?: CatalogOptions): Catalog {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CatalogError("INVALID_SEED", `Cannot read catalog seed "${String(path)}": ${reason}`);
    }

    if (!isCatalogSeed(parsed)) {
      throw new CatalogError("INVALID_SEED", `Catalog seed "${String(path)}" has an invalid shape`);
    }

    return Catalog.fromSeed(parsed, options);
  }

  /**
   * The seed shipped with this package (typical small shop tables).
   */
  static loadDefaultSeed(options?: CatalogOptions): Catalog {
    return Catalog.loadSeedFile(DEFAULT_SEED_URL, options);
  }

  // ─── Resolution ──────────────────────────────────────────────────────

  /**
   * Best fuzzy match for a name, or undefined if nothing clears the threshold.
   */
  match(entityClass: EntityClass, nameText: string): MatchResult | undefined {
    return findBestMatch(nameText, this.list(entityClass), { threshold: this._threshold });
  }

  /**
   * Resolve a name to an id. Throws NOT_FOUND if no candidate qualifies.
   */
  resolve(entityClass: EntityClass, nameText: string): number {
    const best = this.match(entityClass, nameText);
    if (best === undefined) {
      throw new CatalogError(
        "NOT_FOUND",
        `No ${entityClass} matches "${nameText}"`,
        entityClass,
      );
    }
    return best.id;
  }

  /**
   * Resolve a product name to the full catalog product.
   */
  resolveProduct(nameText: string): Product {
    return this.productById(this.resolve("product", nameText));
  }

  /**
   * Exact (normalized) name lookup without fuzzy tolerance.
   */
  findExact(entityClass: EntityClass, nameText: string): ReferenceEntry | undefined {
    const wanted = normalizeName(nameText);
    return this.list(entityClass).find((e) => normalizeName(e.name) === wanted);
  }

  // ─── Lookups ─────────────────────────────────────────────────────────

  /**
   * All rows of a table, in id order.
   */
  list(entityClass: EntityClass): readonly ReferenceEntry[] {
    if (entityClass === "product") {
      return this._products.map((p) => ({ id: p.id, name: p.name }));
    }
    return this._tables.get(entityClass) ?? [];
  }

  /**
   * Get a row by id. Throws UNKNOWN_ID if absent.
   */
  get(entityClass: EntityClass, id: number): ReferenceEntry {
    const entry = this.list(entityClass).find((e) => e.id === id);
    if (entry === undefined) {
      throw new CatalogError("UNKNOWN_ID", `Unknown ${entityClass} id ${String(id)}`, entityClass);
    }
    return entry;
  }

  has(entityClass: EntityClass, id: number): boolean {
    return this.list(entityClass).some((e) => e.id === id);
  }

  /**
   * Get a product by id. Throws UNKNOWN_ID if absent.
   */
  productById(id: number): Product {
    const product = this._products.find((p) => p.id === id);
    if (product === undefined) {
      throw new CatalogError("UNKNOWN_ID", `Unknown product id ${String(id)}`, "product");
    }
    return product;
  }

  get products(): readonly Product[] {
    return this._products;
  }

  get threshold(): number {
    return this._threshold;
  }
}

// =============================================================================
// Seed helpers
// =============================================================================

function buildTable(entityClass: EntityClass, rows: readonly SeedEntry[]): readonly ReferenceEntry[] {
  const seen = new Set<string>();
  return rows.map((row, index) => {
    const key = normalizeName(row.name);
    if (key === "") {
      throw new CatalogError("INVALID_SEED", `Blank ${entityClass} name at position ${String(index)}`, entityClass);
    }
    if (seen.has(key)) {
      throw new CatalogError("DUPLICATE_NAME", `Duplicate ${entityClass} name "${row.name}"`, entityClass);
    }
    seen.add(key);
    const base = { id: index + 1, name: row.name.trim() };
    return row.description !== undefined ? { ...base, description: row.description } : base;
  });
}

function buildProducts(
  rows: readonly SeedProduct[],
  categories: readonly ReferenceEntry[],
): readonly Product[] {
  const table = buildTable("product", rows);
  return table.map((entry, index) => {
    const row = rows[index];
    if (row === undefined) {
      throw new CatalogError("INVALID_SEED", `Missing product row ${String(index)}`, "product");
    }
    const category = categories.find((c) => normalizeName(c.name) === normalizeName(row.category));
    if (category === undefined) {
      throw new CatalogError(
        "INVALID_SEED",
        `Product "${row.name}" references unknown category "${row.category}"`,
        "product",
      );
    }
    if (!/^\d+(\.\d+)?$/.test(row.minStock)) {
      throw new CatalogError(
        "INVALID_SEED",
        `Product "${row.name}" has invalid minStock "${row.minStock}"`,
        "product",
      );
    }
    return {
      id: entry.id,
      name: entry.name,
      unit: row.unit,
      minStock: row.minStock,
      categoryId: category.id,
    };
  });
}

function isSeedEntryList(value: unknown): value is SeedEntry[] {
  return (
    Array.isArray(value) &&
    value.every(
      (v: unknown) =>
        v !== null &&
        typeof v === "object" &&
        typeof (v as Record<string, unknown>).name === "string",
    )
  );
}

function isSeedProductList(value: unknown): value is SeedProduct[] {
  return (
    Array.isArray(value) &&
    value.every((v: unknown) => {
      if (v === null || typeof v !== "object") return false;
      const r = v as Record<string, unknown>;
      return (
        typeof r.name === "string" &&
        typeof r.unit === "string" &&
        typeof r.minStock === "string" &&
        typeof r.category === "string"
      );
    })
  );
}

function isCatalogSeed(value: unknown): value is CatalogSeed {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isSeedEntryList(v.expenseTypes) &&
    isSeedEntryList(v.categories) &&
    isSeedEntryList(v.paymentMethods) &&
    isSeedEntryList(v.suppliers) &&
    isSeedProductList(v.products)
  );
}
