/**
 * Matching Engine
 *
 * Finds matching fragment pairs between two text entries.
 * - equal: hashed set intersection, O(min(|A|, |B|)), emits (f, f)
 * - similarity: every fragment of A against every fragment of B through the
 *   kind's oracle, O(|A| · |B|). This sweep dominates the cost of a query.
 *
 * An empty pair list means no evidence for that owner pair.
 */

import { FragmentPair, Metric, SimilarityKind, TextEntry } from '../../types/corpus.types';
import { ComparisonMeter } from './comparison-budget';
import { isSimilar } from './similarity-oracles';

export interface MatchOutcome {
  pairs: FragmentPair[];
  /** False when the budget ran out part-way through this pair */
  complete: boolean;
}

export interface FragmentMatcher {
  match(source: TextEntry, against: TextEntry, meter: ComparisonMeter): MatchOutcome;
}

export class EqualFragmentMatcher implements FragmentMatcher {
  match(source: TextEntry, against: TextEntry): MatchOutcome {
    const [smaller, larger] = source.fragments.size <= against.fragments.size
      ? [source.fragments, against.fragments]
      : [against.fragments, source.fragments];

    const pairs: FragmentPair[] = [];
    for (const fragment of smaller) {
      if (larger.has(fragment)) {
        pairs.push([fragment, fragment]);
      }
    }
    return { pairs, complete: true };
  }
}

export class SimilarityFragmentMatcher implements FragmentMatcher {
  constructor(
    private readonly kind: SimilarityKind,
    private readonly cutoff: number
  ) {}

  match(source: TextEntry, against: TextEntry, meter: ComparisonMeter): MatchOutcome {
    const pairs: FragmentPair[] = [];
    for (const fragmentA of source.fragments) {
      for (const fragmentB of against.fragments) {
        if (!meter.consume()) {
          return { pairs, complete: false };
        }
        if (isSimilar(fragmentA, fragmentB, this.kind, this.cutoff)) {
          pairs.push([fragmentA, fragmentB]);
        }
      }
    }
    return { pairs, complete: true };
  }
}

export function createFragmentMatcher(metric: Metric, cutoff: number): FragmentMatcher {
  switch (metric.kind) {
    case 'equal':
      return new EqualFragmentMatcher();
    case 'similarity':
      return new SimilarityFragmentMatcher(metric.similarity, cutoff);
  }
}

/**
 * Unbudgeted convenience wrapper: the pairs for one source/against comparison.
 */
export function matchFragments(
  source: TextEntry,
  against: TextEntry,
  metric: Metric,
  cutoff: number
): FragmentPair[] {
  return createFragmentMatcher(metric, cutoff).match(source, against, new ComparisonMeter()).pairs;
}
