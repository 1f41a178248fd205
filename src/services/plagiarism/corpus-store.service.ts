/**
 * Corpus Store
 *
 * Holds the trusted and untrusted partitions of indexed texts and runs
 * plagiarism checks over them.
 *
 * Partitions are owner-keyed maps: adding an owner twice replaces the earlier
 * entry (last write wins). The same owner ID may exist in both partitions as
 * two independent records. Queries never mutate the store.
 */

import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import { loadCorpusConfig } from '../../config/corpus.config';
import {
  comparisonBudgetSchema,
  corpusStoreOptionsSchema,
  CorpusStoreOptions,
  CorpusStoreOptionsInput,
  ownerIdSchema,
} from '../../schemas/corpus.schemas';
import {
  ComparisonBudget,
  ComparisonOutcome,
  Metric,
  metricFromName,
  NormalizedTextPrecedence,
  OwnerID,
  PlagiarismResult,
  TextEntry,
} from '../../types/corpus.types';
import { ComparisonOrchestrator } from './comparison-orchestrator';
import { buildTextEntry } from './fragment-indexer';
import { normalizeText } from './text-normalizer';

export type PartitionName = 'trusted' | 'untrusted';

/**
 * Validate raw store options, rejecting malformed configuration such as n = 0.
 */
export function parseCorpusOptions(raw: unknown): CorpusStoreOptions {
  const parsed = corpusStoreOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.invalidConfig(
      `Invalid corpus configuration: ${parsed.error.errors.map((e) => e.message).join('; ')}`,
      { issues: parsed.error.flatten().fieldErrors }
    );
  }
  return parsed.data;
}

export class CorpusStore {
  /** Words per fragment */
  readonly n: number;
  /** Metric cutoff, read on the metric's own scale */
  readonly s: number;
  readonly metric: Metric;
  readonly normalizedTextPrecedence: NormalizedTextPrecedence;

  private readonly defaultBudget: ComparisonBudget;
  private readonly orchestrator: ComparisonOrchestrator;
  private readonly trusted = new Map<OwnerID, TextEntry>();
  private readonly untrusted = new Map<OwnerID, TextEntry>();

  constructor(options: CorpusStoreOptionsInput, now: () => number = Date.now) {
    const parsed = parseCorpusOptions(options);

    this.n = parsed.n;
    this.s = parsed.s;
    this.metric = metricFromName(parsed.metric);
    this.normalizedTextPrecedence = parsed.normalizedTextPrecedence;
    this.defaultBudget = parsed.budget ?? {};
    this.orchestrator = new ComparisonOrchestrator({ metric: this.metric, cutoff: this.s }, now);
  }

  /**
   * Build a store from NGRAM_SIZE, METRIC_CUTOFF, METRIC and related variables.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): CorpusStore {
    const corpusConfig = loadCorpusConfig(env);
    return new CorpusStore(parseCorpusOptions({
      n: corpusConfig.ngramSize,
      s: corpusConfig.metricCutoff,
      metric: corpusConfig.metric,
      normalizedTextPrecedence: corpusConfig.normalizedTextPrecedence,
      budget: {
        deadlineMs: corpusConfig.comparisonDeadlineMs,
        maxFragmentComparisons: corpusConfig.maxFragmentComparisons,
      },
    }));
  }

  /**
   * Add reference material that untrusted texts are checked against.
   */
  addTrustedText(owner: OwnerID, rawText: string): void {
    this.insert('trusted', owner, rawText);
  }

  /**
   * Add a submission to be screened.
   */
  addUntrustedText(owner: OwnerID, rawText: string): void {
    this.insert('untrusted', owner, rawText);
  }

  /**
   * The stored entry for an owner. Words and location lists are frozen in place;
   * the fragment set and location map come back as copies, since a Set or Map
   * cannot be frozen.
   */
  getEntry(partition: PartitionName, owner: OwnerID): TextEntry | undefined {
    const entry = this.partition(partition).get(owner);
    if (!entry) return undefined;
    return Object.freeze({
      ...entry,
      fragments: new Set(entry.fragments),
      locations: new Map(entry.locations),
    });
  }

  owners(partition: PartitionName): OwnerID[] {
    return [...this.partition(partition).keys()];
  }

  /**
   * Owner → normalized words across both partitions. When an owner exists in
   * both, normalizedTextPrecedence picks the partition that wins.
   */
  getAllNormalizedText(): Map<OwnerID, string[]> {
    const [first, second] = this.normalizedTextPrecedence === 'untrusted'
      ? [this.trusted, this.untrusted]
      : [this.untrusted, this.trusted];

    const merged = new Map<OwnerID, string[]>();
    for (const partition of [first, second]) {
      for (const [owner, entry] of partition) {
        merged.set(owner, [...entry.words]);
      }
    }
    return merged;
  }

  checkUntrustedPlagiarism(budget?: ComparisonBudget): PlagiarismResult[] {
    return this.compareUntrusted(budget).results;
  }

  checkTrustedPlagiarism(budget?: ComparisonBudget): PlagiarismResult[] {
    return this.compareTrusted(budget).results;
  }

  /**
   * Untrusted-vs-untrusted check with work counters and the truncation flag.
   */
  compareUntrusted(budget?: ComparisonBudget): ComparisonOutcome {
    const outcome = this.orchestrator.compareUntrusted(this.untrusted, this.resolveBudget(budget));
    this.logOutcome('untrusted', outcome);
    return outcome;
  }

  /**
   * Trusted-vs-untrusted check with work counters and the truncation flag.
   */
  compareTrusted(budget?: ComparisonBudget): ComparisonOutcome {
    const outcome = this.orchestrator.compareTrusted(this.trusted, this.untrusted, this.resolveBudget(budget));
    this.logOutcome('trusted', outcome);
    return outcome;
  }

  private insert(partitionName: PartitionName, owner: OwnerID, rawText: string): void {
    const ownerCheck = ownerIdSchema.safeParse(owner);
    if (!ownerCheck.success) {
      throw AppError.invalidInput(ownerCheck.error.errors[0]?.message ?? 'Invalid owner ID', { owner });
    }

    const partition = this.partition(partitionName);
    const entry = buildTextEntry(owner, normalizeText(rawText), this.n);
    const replaced = partition.has(owner);
    partition.set(owner, entry);

    logger.debug(`[CorpusStore] ${replaced ? 'Replaced' : 'Added'} ${partitionName} text for ${owner}`, {
      words: entry.words.length,
      fragments: entry.fragments.size,
    });
  }

  private partition(name: PartitionName): Map<OwnerID, TextEntry> {
    return name === 'trusted' ? this.trusted : this.untrusted;
  }

  /**
   * Per-call budget over the store default. Keys left undefined keep the default.
   */
  private resolveBudget(budget: ComparisonBudget = {}): ComparisonBudget {
    const overrides = Object.fromEntries(
      Object.entries(budget).filter(([, value]) => value !== undefined)
    );
    const parsed = comparisonBudgetSchema.safeParse({ ...this.defaultBudget, ...overrides });
    if (!parsed.success) {
      throw AppError.invalidConfig(
        `Invalid comparison budget: ${parsed.error.errors.map((e) => e.message).join('; ')}`,
        { issues: parsed.error.flatten().fieldErrors }
      );
    }
    return parsed.data;
  }

  private logOutcome(mode: PartitionName, outcome: ComparisonOutcome): void {
    if (outcome.truncated) {
      logger.warn(`[CorpusStore] ${mode} check stopped early by comparison budget; results are partial`, {
        pairsCompared: outcome.pairsCompared,
        fragmentComparisons: outcome.fragmentComparisons,
      });
    }
    logger.info(`[CorpusStore] ${mode} check found ${outcome.results.length} matching pair(s)`, {
      pairsCompared: outcome.pairsCompared,
    });
  }
}
