/**
 * @stockbook/catalog — Deterministic fuzzy name matching.
 *
 * Names are compared after normalization (case, accents, punctuation and
 * whitespace removed). The similarity of a candidate is the larger of:
 * - edit similarity: 1 - levenshtein / max(length)
 * - token overlap: share of the query's words found in the candidate, or of
 *   the candidate's words found in the query, whichever is larger
 *
 * Ambiguity policy, in order: higher score, exact match, shorter edit
 * distance, lower id.
 */

import type { MatchOptions, MatchResult } from "./types.js";

export const DEFAULT_MATCH_THRESHOLD = 0.6;

/** Words shorter than this ("de", "la") are ignored for overlap. */
const MIN_TOKEN_LENGTH = 3;

// ─── Normalization ──────────────────────────────────────────────────────

/**
 * Lower-case, strip diacritics and punctuation, collapse whitespace.
 *
 * "Tarjeta de Crédito" → "tarjeta de credito"
 */
export function normalizeName(text: string): string {
  return text
    .toLowerCase()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9\s]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

// ─── Distance ───────────────────────────────────────────────────────────

/**
 * Classic Levenshtein distance (insert, delete, substitute = 1).
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min(
          (previous[j] ?? 0) + 1,
          (current[j - 1] ?? 0) + 1,
          (previous[j - 1] ?? 0) + cost,
        ),
      );
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

function tokens(normalized: string): string[] {
  return normalized.split(" ").filter((t) => t.length >= MIN_TOKEN_LENGTH);
}

function tokenOverlap(query: string, candidate: string): number {
  const queryTokens = new Set(tokens(query));
  const candidateTokens = new Set(tokens(candidate));
  if (queryTokens.size === 0 || candidateTokens.size === 0) return 0;

  let shared = 0;
  for (const token of queryTokens) {
    if (candidateTokens.has(token)) shared++;
  }
  return Math.max(shared / queryTokens.size, shared / candidateTokens.size);
}

// ─── Scoring ────────────────────────────────────────────────────────────

/**
 * Score one candidate name against a query.
 */
export function scoreName(
  query: string,
  candidate: { readonly id: number; readonly name: string },
): MatchResult {
  const q = normalizeName(query);
  const c = normalizeName(candidate.name);
  const distance = levenshtein(q, c);

  if (q.length === 0 || c.length === 0) {
    return { id: candidate.id, name: candidate.name, score: 0, exact: false, distance };
  }

  const exact = q === c;
  const editSimilarity = 1 - distance / Math.max(q.length, c.length);
  const overlap = tokenOverlap(q, c);
  const score = exact ? 1 : Math.max(editSimilarity, overlap);

  return { id: candidate.id, name: candidate.name, score, exact, distance };
}

function compareMatches(a: MatchResult, b: MatchResult): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.exact !== b.exact) return a.exact ? -1 : 1;
  if (a.distance !== b.distance) return a.distance - b.distance;
  return a.id - b.id;
}

/**
 * Rank all candidates that clear the threshold, best first.
 */
export function rankMatches(
  query: string,
  candidates: readonly { readonly id: number; readonly name: string }[],
  options?: MatchOptions,
): readonly MatchResult[] {
  const threshold = options?.threshold ?? DEFAULT_MATCH_THRESHOLD;
  return candidates
    .map((c) => scoreName(query, c))
    .filter((m) => m.score > 0 && m.score >= threshold)
    .sort(compareMatches);
}

/**
 * The single best candidate above the threshold, or undefined.
 */
export function findBestMatch(
  query: string,
  candidates: readonly { readonly id: number; readonly name: string }[],
  options?: MatchOptions,
): MatchResult | undefined {
  return rankMatches(query, candidates, options)[0];
}
