export { CorpusStore, parseCorpusOptions } from './corpus-store.service';
export type { PartitionName } from './corpus-store.service';
export { ComparisonOrchestrator, resolveLocations } from './comparison-orchestrator';
export type { Partition, OrchestratorSettings } from './comparison-orchestrator';
export { ComparisonMeter } from './comparison-budget';
export {
  EqualFragmentMatcher,
  SimilarityFragmentMatcher,
  createFragmentMatcher,
  matchFragments,
} from './matching-engine';
export type { FragmentMatcher, MatchOutcome } from './matching-engine';
export { indexFragments, buildTextEntry } from './fragment-indexer';
export { normalizeText, wordNgrams } from './text-normalizer';
export {
  similar,
  isSimilar,
  similarityOracles,
  levenshteinDistance,
  damerauLevenshteinDistance,
  tokenOverlapRatio,
} from './similarity-oracles';
export type { SimilarityOracle, CutoffScale } from './similarity-oracles';
export { serializeResult, serializeResults, parseSerializedResults } from './result-serializer';
export { generateReport, summarizeResult, mergeLocations } from './report-generator';
export type { PlagiarismReport, PairSummary, Passage } from './report-generator';
