/**
 * Corpus Types
 * Shared shapes for fragment indexing, matching and comparison results
 */

export type OwnerID = string;

/**
 * Half-open word-index interval [start, end) into an owner's normalized words.
 * end - start always equals the corpus n-gram size.
 */
export interface FragmentLocation {
  readonly start: number;
  readonly end: number;
}

export interface FragmentIndex {
  fragments: Set<string>;
  locations: Map<string, FragmentLocation[]>;
}

/**
 * Per-owner record built once at insertion and frozen after.
 */
export interface TextEntry {
  readonly owner: OwnerID;
  readonly words: readonly string[];
  readonly fragments: ReadonlySet<string>;
  readonly locations: ReadonlyMap<string, readonly FragmentLocation[]>;
}

export const SIMILARITY_KINDS = [
  'levenshtein',
  'damerau-levenshtein',
  'sorensen-dice',
  'token-overlap',
] as const;

export type SimilarityKind = typeof SIMILARITY_KINDS[number];

export type Metric =
  | { kind: 'equal' }
  | { kind: 'similarity'; similarity: SimilarityKind };

export const METRIC_NAMES = ['equal', ...SIMILARITY_KINDS] as const;

export type MetricName = typeof METRIC_NAMES[number];

export type FragmentPair = [fragmentA: string, fragmentB: string];

export type LocationPair = [locationsA: FragmentLocation[], locationsB: FragmentLocation[]];

export interface PlagiarismResult {
  readonly owner1: OwnerID;
  readonly owner2: OwnerID;
  /** Index i corresponds to index i of matchingFragmentsLocations */
  readonly matchingFragments: readonly FragmentPair[];
  readonly matchingFragmentsLocations: readonly LocationPair[];
  readonly trustedOwner1: boolean;
  /** True when both members of every pair are the same string */
  readonly equalFragments: boolean;
}

export type NormalizedTextPrecedence = 'trusted' | 'untrusted';

export interface ComparisonBudget {
  /** Wall-clock limit in milliseconds for one whole query */
  deadlineMs?: number;
  /** Maximum number of oracle calls for one whole query */
  maxFragmentComparisons?: number;
  signal?: AbortSignal;
}

export interface ComparisonOutcome {
  results: PlagiarismResult[];
  pairsCompared: number;
  fragmentComparisons: number;
  truncated: boolean;
}

export function metricName(metric: Metric): MetricName {
  return metric.kind === 'equal' ? 'equal' : metric.similarity;
}

export function metricFromName(name: MetricName): Metric {
  return name === 'equal' ? { kind: 'equal' } : { kind: 'similarity', similarity: name };
}
