/**
 * Comparison Budget
 *
 * Tracks the work spent by one query so the similarity sweep can stop early.
 * Stopping only abandons pending comparisons; stored entries are never touched.
 */

import { ComparisonBudget } from '../../types/corpus.types';

// Date.now() is sampled once per this many oracle calls
const DEADLINE_CHECK_INTERVAL = 1024;

export class ComparisonMeter {
  private comparisons = 0;
  private stopped = false;
  private readonly deadlineAt: number;
  private readonly maxComparisons: number;
  private readonly signal?: AbortSignal;
  private readonly now: () => number;

  constructor(budget: ComparisonBudget = {}, now: () => number = Date.now) {
    this.now = now;
    this.deadlineAt = budget.deadlineMs !== undefined
      ? now() + budget.deadlineMs
      : Number.POSITIVE_INFINITY;
    this.maxComparisons = budget.maxFragmentComparisons ?? Number.POSITIVE_INFINITY;
    this.signal = budget.signal;
  }

  /**
   * Record one oracle call. Returns false once the budget is spent.
   */
  consume(): boolean {
    if (this.stopped) return false;
    if (this.comparisons >= this.maxComparisons || this.signal?.aborted) {
      this.stopped = true;
      return false;
    }

    this.comparisons++;
    if (this.comparisons % DEADLINE_CHECK_INTERVAL === 0 && this.now() >= this.deadlineAt) {
      this.stopped = true;
    }
    return true;
  }

  /**
   * Pair-level check made before each owner pair is compared.
   */
  exhausted(): boolean {
    if (!this.stopped && (this.signal?.aborted || this.now() >= this.deadlineAt)) {
      this.stopped = true;
    }
    return this.stopped;
  }

  get fragmentComparisons(): number {
    return this.comparisons;
  }
}
