/**
 * Fuzzy subsequence scoring over already-loaded paths.
 *
 * Candidates are a snapshot of the rendered forest taken when search
 * starts, so scoring never touches the disk. Every query edit re-scores the
 * whole snapshot; no index structure is kept.
 */

import * as path from "path";

export const MAX_MATCHES = 50;

const SEPARATORS = new Set(["/", ".", "_", "-", " "]);

const SEPARATOR_BONUS = 10;
const CONSECUTIVE_BONUS = 5;
const SCATTERED_HIT = 1;

// ─── Types ──────────────────────────────────────────────────────────────────

export interface SearchCandidate {
  readonly path: string;
  readonly isDirectory: boolean;
}

export interface SearchMatch {
  readonly path: string;
  readonly score: number;
  readonly isDirectory: boolean;
}

// ─── Scoring ────────────────────────────────────────────────────────────────

/**
 * Score `query` as a case-insensitive subsequence of `haystack`.
 *
 * Each matched character earns 10 after a separator (or at the start),
 * 5 when it extends a run of matches, 1 otherwise. Returns null unless
 * every query character is matched in order; an empty query scores 0.
 */
export function fuzzyScore(haystack: string, query: string): number | null {
  const needle = Array.from(query.toLowerCase());
  if (needle.length === 0) return 0;

  let score = 0;
  let needleIdx = 0;
  let prevMatch = false;
  let prevWasSeparator = true;

  for (const ch of haystack.toLowerCase()) {
    if (needleIdx < needle.length && ch === needle[needleIdx]) {
      score += prevWasSeparator ? SEPARATOR_BONUS : prevMatch ? CONSECUTIVE_BONUS : SCATTERED_HIT;
      needleIdx += 1;
      prevMatch = true;
    } else {
      prevMatch = false;
    }
    prevWasSeparator = SEPARATORS.has(ch);
  }

  return needleIdx === needle.length ? score : null;
}

/**
 * Rank candidates by the score of their basename.
 * Sorted descending; equal scores keep snapshot order.
 */
export function searchPaths(
  candidates: readonly SearchCandidate[],
  query: string,
  limit: number = MAX_MATCHES,
): SearchMatch[] {
  const matches: SearchMatch[] = [];
  for (const candidate of candidates) {
    const name = path.basename(candidate.path);
    if (name.length === 0) continue;
    const score = fuzzyScore(name, query);
    if (score !== null) {
      matches.push({ path: candidate.path, score, isDirectory: candidate.isDirectory });
    }
  }
  return matches.sort((a, b) => b.score - a.score).slice(0, limit);
}
