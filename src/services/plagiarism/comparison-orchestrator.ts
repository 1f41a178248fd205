/**
 * Comparison Orchestrator
 *
 * Enumerates owner pairs, runs the matching engine on each and resolves every
 * matched fragment back to its word locations.
 *
 * Pairing rules:
 * - untrusted mode: each unordered pair of distinct untrusted owners, once
 * - trusted mode: every trusted owner against every untrusted owner
 */

import {
  ComparisonBudget,
  ComparisonOutcome,
  FragmentLocation,
  FragmentPair,
  LocationPair,
  Metric,
  OwnerID,
  PlagiarismResult,
  TextEntry,
} from '../../types/corpus.types';
import { AppError } from '../../utils/app-error';
import { ComparisonMeter } from './comparison-budget';
import { createFragmentMatcher, FragmentMatcher } from './matching-engine';

export type Partition = ReadonlyMap<OwnerID, TextEntry>;

export interface OrchestratorSettings {
  metric: Metric;
  cutoff: number;
}

export class ComparisonOrchestrator {
  private readonly matcher: FragmentMatcher;
  private readonly equalFragments: boolean;

  constructor(settings: OrchestratorSettings, private readonly now: () => number = Date.now) {
    this.matcher = createFragmentMatcher(settings.metric, settings.cutoff);
    this.equalFragments = settings.metric.kind === 'equal';
  }

  compareUntrusted(untrusted: Partition, budget?: ComparisonBudget): ComparisonOutcome {
    const meter = new ComparisonMeter(budget, this.now);
    const entries = [...untrusted.values()];
    const outcome = this.emptyOutcome();

    for (let i = 0; i < entries.length; i++) {
      for (let j = i + 1; j < entries.length; j++) {
        if (!this.comparePair(entries[i], entries[j], false, untrusted, untrusted, meter, outcome)) {
          return this.finish(outcome, meter);
        }
      }
    }
    return this.finish(outcome, meter);
  }

  compareTrusted(trusted: Partition, untrusted: Partition, budget?: ComparisonBudget): ComparisonOutcome {
    const meter = new ComparisonMeter(budget, this.now);
    const outcome = this.emptyOutcome();

    for (const source of trusted.values()) {
      for (const against of untrusted.values()) {
        if (!this.comparePair(source, against, true, trusted, untrusted, meter, outcome)) {
          return this.finish(outcome, meter);
        }
      }
    }
    return this.finish(outcome, meter);
  }

  /**
   * Returns false when the budget stopped the sweep.
   */
  private comparePair(
    source: TextEntry,
    against: TextEntry,
    trustedOwner1: boolean,
    sourcePartition: Partition,
    againstPartition: Partition,
    meter: ComparisonMeter,
    outcome: ComparisonOutcome
  ): boolean {
    if (meter.exhausted()) {
      outcome.truncated = true;
      return false;
    }

    const { pairs, complete } = this.matcher.match(source, against, meter);
    if (!complete) {
      outcome.truncated = true;
      return false;
    }

    outcome.pairsCompared++;
    if (pairs.length === 0) return true;

    const locations = pairs.map(([fragmentA, fragmentB]): LocationPair => [
      resolveLocations(sourcePartition, source.owner, fragmentA),
      resolveLocations(againstPartition, against.owner, fragmentB),
    ]);

    outcome.results.push(this.buildResult(source.owner, against.owner, pairs, locations, trustedOwner1));
    return true;
  }

  private buildResult(
    owner1: OwnerID,
    owner2: OwnerID,
    matchingFragments: FragmentPair[],
    matchingFragmentsLocations: LocationPair[],
    trustedOwner1: boolean
  ): PlagiarismResult {
    return Object.freeze({
      owner1,
      owner2,
      matchingFragments,
      matchingFragmentsLocations,
      trustedOwner1,
      equalFragments: this.equalFragments,
    });
  }

  private emptyOutcome(): ComparisonOutcome {
    return { results: [], pairsCompared: 0, fragmentComparisons: 0, truncated: false };
  }

  private finish(outcome: ComparisonOutcome, meter: ComparisonMeter): ComparisonOutcome {
    outcome.fragmentComparisons = meter.fragmentComparisons;
    return outcome;
  }
}

/**
 * Copy of a fragment's locations for one owner. A miss means the index and the
 * matcher disagree, which is a bug.
 */
export function resolveLocations(partition: Partition, owner: OwnerID, fragment: string): FragmentLocation[] {
  const locations = partition.get(owner)?.locations.get(fragment);
  if (!locations) {
    throw AppError.internal(
      `No locations recorded for fragment "${fragment}" of owner ${owner}`,
      'LOCATION_LOOKUP_FAULT',
      { owner, fragment }
    );
  }
  return locations.map((location) => ({ start: location.start, end: location.end }));
}
