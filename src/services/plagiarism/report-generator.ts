/**
 * Plagiarism Report Generator
 *
 * Turns comparison results into per-pair summaries: overlapping fragment
 * locations are merged into passages and sliced back out of the normalized
 * words, with the share of each text the passages cover.
 */

import { FragmentLocation, metricName, OwnerID, PlagiarismResult } from '../../types/corpus.types';
import { AppError } from '../../utils/app-error';
import { CorpusStore } from './corpus-store.service';

export interface Passage extends FragmentLocation {
  text: string;
}

export interface PairSummary {
  owner1: OwnerID;
  owner2: OwnerID;
  trustedOwner1: boolean;
  matchCount: number;
  owner1Passages: Passage[];
  owner2Passages: Passage[];
  /** Fraction of owner1's words inside a passage, 0–1 */
  owner1Coverage: number;
  owner2Coverage: number;
}

export interface PlagiarismReport {
  generatedAt: string;
  settings: { n: number; s: number; metric: string };
  totalPairs: number;
  totalMatches: number;
  pairs: PairSummary[];
}

/**
 * Merge overlapping or touching intervals into maximal runs, sorted by start.
 */
export function mergeLocations(locations: readonly FragmentLocation[]): FragmentLocation[] {
  const sorted = [...locations].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: FragmentLocation[] = [];

  for (const location of sorted) {
    const last = merged[merged.length - 1];
    if (last && location.start <= last.end) {
      merged[merged.length - 1] = { start: last.start, end: Math.max(last.end, location.end) };
    } else {
      merged.push({ start: location.start, end: location.end });
    }
  }
  return merged;
}

function toPassages(words: readonly string[], locations: FragmentLocation[]): Passage[] {
  return mergeLocations(locations).map((location) => ({
    ...location,
    text: words.slice(location.start, location.end).join(' '),
  }));
}

function coverage(words: readonly string[], passages: Passage[]): number {
  if (words.length === 0) return 0;
  const covered = passages.reduce((sum, passage) => sum + (passage.end - passage.start), 0);
  return covered / words.length;
}

/**
 * A result only describes the text an owner had when it was computed. Once the
 * owner is replaced, its locations no longer spell out the matched fragment.
 */
function assertCurrent(
  owner: OwnerID,
  words: readonly string[],
  fragment: string,
  locations: readonly FragmentLocation[]
): void {
  for (const location of locations) {
    if (location.end > words.length || words.slice(location.start, location.end).join(' ') !== fragment) {
      throw AppError.invalidInput(`Result is stale: ${owner} has been replaced since it was computed`, {
        owner,
        fragment,
        location: { start: location.start, end: location.end },
      });
    }
  }
}

export function summarizeResult(store: CorpusStore, result: PlagiarismResult): PairSummary {
  const entry1 = store.getEntry(result.trustedOwner1 ? 'trusted' : 'untrusted', result.owner1);
  const entry2 = store.getEntry('untrusted', result.owner2);
  if (!entry1 || !entry2) {
    throw AppError.invalidInput(
      `Result refers to owners no longer in the corpus: ${result.owner1}, ${result.owner2}`
    );
  }

  result.matchingFragments.forEach(([fragment1, fragment2], i) => {
    const [locations1, locations2] = result.matchingFragmentsLocations[i] ?? [[], []];
    assertCurrent(result.owner1, entry1.words, fragment1, locations1);
    assertCurrent(result.owner2, entry2.words, fragment2, locations2);
  });

  const owner1Passages = toPassages(entry1.words, result.matchingFragmentsLocations.flatMap(([a]) => a));
  const owner2Passages = toPassages(entry2.words, result.matchingFragmentsLocations.flatMap(([, b]) => b));

  return {
    owner1: result.owner1,
    owner2: result.owner2,
    trustedOwner1: result.trustedOwner1,
    matchCount: result.matchingFragments.length,
    owner1Passages,
    owner2Passages,
    owner1Coverage: coverage(entry1.words, owner1Passages),
    owner2Coverage: coverage(entry2.words, owner2Passages),
  };
}

export function generateReport(
  store: CorpusStore,
  results: readonly PlagiarismResult[],
  generatedAt: Date = new Date()
): PlagiarismReport {
  const pairs = results.map((result) => summarizeResult(store, result));
  return {
    generatedAt: generatedAt.toISOString(),
    settings: {
      n: store.n,
      s: store.s,
      metric: metricName(store.metric),
    },
    totalPairs: pairs.length,
    totalMatches: pairs.reduce((sum, pair) => sum + pair.matchCount, 0),
    pairs,
  };
}
