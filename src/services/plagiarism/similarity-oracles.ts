/**
 * Fragment Similarity Oracles
 *
 * One oracle per similarity kind. Each reads the cutoff on its own scale:
 * - 'max-distance': edit distance must be <= cutoff
 * - 'min-percent': similarity ratio × 100 must be >= cutoff
 * Both boundaries are inclusive.
 *
 * Pure computation, no side effects.
 */

import stringSimilarity from 'string-similarity';
import { Metric, SimilarityKind } from '../../types/corpus.types';

export type CutoffScale = 'max-distance' | 'min-percent';

export interface SimilarityOracle {
  scale: CutoffScale;
  /** Raw distance or ratio in [0, 1], depending on scale */
  score(fragmentA: string, fragmentB: string): number;
}

// Guards percent comparisons against float noise such as 0.29 * 100 = 28.999...
const PERCENT_EPSILON = 1e-9;

/**
 * Character-level Levenshtein distance (insert, delete, substitute).
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Restricted Damerau-Levenshtein (optimal string alignment): Levenshtein plus
 * transposition of two adjacent characters, no substring edited twice.
 */
export function damerauLevenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const rows: number[][] = [];
  for (let i = 0; i <= a.length; i++) {
    rows.push(new Array<number>(b.length + 1).fill(0));
    rows[i][0] = i;
  }
  for (let j = 0; j <= b.length; j++) {
    rows[0][j] = j;
  }

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      let best = Math.min(
        rows[i - 1][j] + 1,
        rows[i][j - 1] + 1,
        rows[i - 1][j - 1] + cost
      );
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        best = Math.min(best, rows[i - 2][j - 2] + 1);
      }
      rows[i][j] = best;
    }
  }

  return rows[a.length][b.length];
}

/**
 * Jaccard ratio of the two fragments' word sets.
 */
export function tokenOverlapRatio(fragmentA: string, fragmentB: string): number {
  const wordsA = new Set(fragmentA.split(' ').filter(Boolean));
  const wordsB = new Set(fragmentB.split(' ').filter(Boolean));
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  const smaller = wordsA.size <= wordsB.size ? wordsA : wordsB;
  const larger = wordsA.size <= wordsB.size ? wordsB : wordsA;
  for (const word of smaller) {
    if (larger.has(word)) intersection++;
  }

  const union = wordsA.size + wordsB.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

export const similarityOracles = {
  levenshtein: { scale: 'max-distance', score: levenshteinDistance },
  'damerau-levenshtein': { scale: 'max-distance', score: damerauLevenshteinDistance },
  'sorensen-dice': { scale: 'min-percent', score: stringSimilarity.compareTwoStrings },
  'token-overlap': { scale: 'min-percent', score: tokenOverlapRatio },
} satisfies Record<SimilarityKind, SimilarityOracle>;

export function isSimilar(
  fragmentA: string,
  fragmentB: string,
  kind: SimilarityKind,
  cutoff: number
): boolean {
  const oracle: SimilarityOracle = similarityOracles[kind];

  if (oracle.scale === 'max-distance') {
    // Edit distance is at least the length difference
    if (Math.abs(fragmentA.length - fragmentB.length) > cutoff) return false;
    return oracle.score(fragmentA, fragmentB) <= cutoff;
  }

  return oracle.score(fragmentA, fragmentB) * 100 + PERCENT_EPSILON >= cutoff;
}

/**
 * Oracle entry point keyed by metric. Equal compares strings directly.
 */
export function similar(fragmentA: string, fragmentB: string, metric: Metric, cutoff: number): boolean {
  if (metric.kind === 'equal') return fragmentA === fragmentB;
  return isSimilar(fragmentA, fragmentB, metric.similarity, cutoff);
}
