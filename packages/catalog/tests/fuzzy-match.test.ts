/**
 * Tests for fuzzy name matching.
 *
 * Covers:
 * - Normalization (case, accents, punctuation, whitespace)
 * - Levenshtein distance
 * - Scoring (edit similarity vs token overlap)
 * - Ranking and the ambiguity policy
 */

import { describe, it, expect } from "vitest";
import {
  normalizeName,
  levenshtein,
  scoreName,
  rankMatches,
  findBestMatch,
} from "../src/fuzzy-match.js";

const PAYMENT_METHODS = [
  { id: 1, name: "Efectivo" },
  { id: 2, name: "Tarjeta de Crédito" },
  { id: 3, name: "Tarjeta de Débito" },
  { id: 4, name: "Transferencia" },
];

describe("normalizeName", () => {
  it("lower-cases and strips accents", () => {
    expect(normalizeName("Azúcar")).toBe("azucar");
    expect(normalizeName("Ñandú")).toBe("nandu");
  });

  it("removes punctuation and collapses whitespace", () => {
    expect(normalizeName("  Tarjeta   de Crédito! ")).toBe("tarjeta de credito");
  });

  it("returns empty string for symbols only", () => {
    expect(normalizeName("¿?!")).toBe("");
  });
});

describe("levenshtein", () => {
  it("computes classic distances", () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("harna", "harina")).toBe(1);
  });

  it("handles empty strings", () => {
    expect(levenshtein("", "abc")).toBe(3);
    expect(levenshtein("abc", "")).toBe(3);
    expect(levenshtein("", "")).toBe(0);
  });
});

describe("scoreName", () => {
  it("scores an exact normalized match as 1", () => {
    const m = scoreName("tarjeta de credito", { id: 2, name: "Tarjeta de Crédito" });
    expect(m.score).toBe(1);
    expect(m.exact).toBe(true);
    expect(m.distance).toBe(0);
  });

  it("uses edit similarity for typos", () => {
    const m = scoreName("harna", { id: 1, name: "Harina" });
    expect(m.exact).toBe(false);
    expect(m.score).toBeCloseTo(1 - 1 / 6, 10);
  });

  it("scores a query word found in a longer name as full overlap", () => {
    const m = scoreName("credito", { id: 2, name: "Tarjeta de Crédito" });
    expect(m.score).toBe(1);
    expect(m.exact).toBe(false);
  });

  it("scores a candidate name found in a longer query as full overlap", () => {
    const m = scoreName("supermercado lider", { id: 1, name: "Lider" });
    expect(m.score).toBe(1);
    expect(m.exact).toBe(false);
  });

  it("takes the larger side of a partial overlap", () => {
    // 1 of 2 query words, 1 of 4 candidate words
    const m = scoreName("harina blanca", { id: 1, name: "Harina Extra Fina Premium" });
    expect(m.score).toBe(0.5);
  });

  it("scores blank queries as 0", () => {
    expect(scoreName("   ", { id: 1, name: "Lider" }).score).toBe(0);
  });
});

describe("rankMatches", () => {
  it("drops candidates below the threshold", () => {
    const ranked = rankMatches("credito", PAYMENT_METHODS);
    expect(ranked.map((m) => m.id)).toEqual([2]);
  });

  it("breaks equal scores by shorter edit distance", () => {
    // Both cards contain "tarjeta" (overlap 1); "de debito" is one char shorter.
    const ranked = rankMatches("tarjeta", PAYMENT_METHODS);
    expect(ranked.map((m) => m.id)).toEqual([3, 2]);
  });

  it("breaks equal score and distance by lowest id", () => {
    const best = findBestMatch("Lidr", [
      { id: 7, name: "Lidar" },
      { id: 4, name: "Lider" },
    ]);
    expect(best?.id).toBe(4);
  });

  it("prefers an exact match over earlier near matches", () => {
    const best = findBestMatch("lider", [
      { id: 1, name: "Lidera" },
      { id: 2, name: "Lider" },
    ]);
    expect(best?.id).toBe(2);
    expect(best?.exact).toBe(true);
  });

  it("honors a custom threshold", () => {
    expect(findBestMatch("harna", [{ id: 1, name: "Harina" }], { threshold: 0.9 })).toBeUndefined();
    expect(findBestMatch("harna", [{ id: 1, name: "Harina" }], { threshold: 0.8 })?.id).toBe(1);
  });

  it("ranks an exact name above a full word overlap", () => {
    const ranked = rankMatches("harina", [
      { id: 1, name: "Harina Integral" },
      { id: 2, name: "Harina" },
    ]);
    expect(ranked.map((m) => [m.id, m.score, m.exact])).toEqual([
      [2, 1, true],
      [1, 1, false],
    ]);
  });

  it("ignores short words for overlap", () => {
    expect(findBestMatch("de", PAYMENT_METHODS)).toBeUndefined();
  });
});
