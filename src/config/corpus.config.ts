/**
 * Corpus Configuration
 * Defaults for n-gram size, metric, cutoff and comparison budget.
 * Values are raw here; src/schemas/corpus.schemas.ts validates them.
 */

export interface CorpusEnvConfig {
  /** Words per fragment */
  ngramSize: number;
  /** Metric-specific cutoff */
  metricCutoff: number;
  metric: string;
  normalizedTextPrecedence: string;
  /** Undefined means no deadline */
  comparisonDeadlineMs?: number;
  /** Undefined means no cap on oracle calls */
  maxFragmentComparisons?: number;
}

const optionalInt = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  return parseInt(value, 10);
};

export function loadCorpusConfig(env: NodeJS.ProcessEnv = process.env): CorpusEnvConfig {
  return {
    ngramSize: parseInt(env.NGRAM_SIZE || '3', 10),
    metricCutoff: parseInt(env.METRIC_CUTOFF || '0', 10),
    metric: env.METRIC || 'equal',
    normalizedTextPrecedence: env.NORMALIZED_TEXT_PRECEDENCE || 'untrusted',
    comparisonDeadlineMs: optionalInt(env.COMPARISON_DEADLINE_MS),
    maxFragmentComparisons: optionalInt(env.MAX_FRAGMENT_COMPARISONS),
  };
}
