/**
 * @stockbook/catalog — Reference data store with fuzzy name resolution.
 *
 * Maps free-text names (as typed in chat, with typos and missing
 * accents) to canonical ids of expense types, categories, payment
 * methods, suppliers and products.
 *
 * Design rules:
 * - Tables are immutable after construction
 * - Resolution is pure and deterministic
 * - Fail-closed: below-threshold names throw NOT_FOUND
 */

export { Catalog } from "./catalog.js";
export type { CatalogOptions } from "./catalog.js";

export {
  normalizeName,
  levenshtein,
  scoreName,
  rankMatches,
  findBestMatch,
  DEFAULT_MATCH_THRESHOLD,
} from "./fuzzy-match.js";

export type {
  EntityClass,
  MatchResult,
  MatchOptions,
  SeedEntry,
  SeedProduct,
  CatalogSeed,
  CatalogErrorCode,
} from "./types.js";

export { CatalogError, ENTITY_CLASSES } from "./types.js";
