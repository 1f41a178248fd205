import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../../src/lib/logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

import { logger } from '../../../../src/lib/logger';
import { CorpusStore } from '../../../../src/services/plagiarism/corpus-store.service';
import { AppError } from '../../../../src/utils/app-error';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('CorpusStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  // =========================================================================
  // construction
  // =========================================================================
  describe('constructor', () => {
    it.each([
      [{ n: 0, s: 0, metric: 'equal' as const }],
      [{ n: 1.5, s: 0, metric: 'equal' as const }],
      [{ n: 3, s: -1, metric: 'levenshtein' as const }],
    ])('rejects malformed configuration %j', (options) => {
      const error = captureError(() => new CorpusStore(options));

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: 'INVALID_CORPUS_CONFIG', isOperational: true });
    });

    it('defaults the normalized text precedence to untrusted', () => {
      const store = new CorpusStore({ n: 2, s: 0, metric: 'equal' });

      expect(store.normalizedTextPrecedence).toBe('untrusted');
      expect(store.metric).toEqual({ kind: 'equal' });
    });
  });

  describe('fromEnvironment', () => {
    it('reads n, cutoff and metric from the environment', () => {
      const store = CorpusStore.fromEnvironment({ NGRAM_SIZE: '2', METRIC: 'levenshtein', METRIC_CUTOFF: '1' });

      expect(store.n).toBe(2);
      expect(store.s).toBe(1);
      expect(store.metric).toEqual({ kind: 'similarity', similarity: 'levenshtein' });
    });

    it('rejects a zero n-gram size', () => {
      expect(() => CorpusStore.fromEnvironment({ NGRAM_SIZE: '0' })).toThrow(AppError);
    });

    it('rejects an unknown metric', () => {
      expect(() => CorpusStore.fromEnvironment({ METRIC: 'cosine' })).toThrow('Invalid corpus configuration');
    });
  });

  // =========================================================================
  // insertion
  // =========================================================================
  describe('addUntrustedText', () => {
    it('rejects an empty owner ID', () => {
      const store = new CorpusStore({ n: 2, s: 0, metric: 'equal' });

      expect(captureError(() => store.addUntrustedText('', 'some text'))).toMatchObject({ code: 'INVALID_INPUT' });
    });

    it('replaces all fragments of an owner added twice', () => {
      const store = new CorpusStore({ n: 2, s: 0, metric: 'equal' });
      store.addUntrustedText('alice', 'one two three');
      store.addUntrustedText('bob', 'one two three');
      expect(store.checkUntrustedPlagiarism()).toHaveLength(1);

      store.addUntrustedText('bob', 'seven eight nine');

      expect(store.checkUntrustedPlagiarism()).toEqual([]);
      expect(store.owners('untrusted')).toEqual(['alice', 'bob']);
      expect(store.getEntry('untrusted', 'bob')?.words).toEqual(['seven', 'eight', 'nine']);
      expect([...(store.getEntry('untrusted', 'bob')?.fragments ?? [])]).toEqual(['seven eight', 'eight nine']);
    });

    it('hands out entries that cannot change what the store holds', () => {
      const store = new CorpusStore({ n: 2, s: 0, metric: 'equal' });
      store.addUntrustedText('a', 'one two three');
      store.addUntrustedText('b', 'one two four');
      const entry = store.getEntry('untrusted', 'a');

      Set.prototype.add.call(entry?.fragments, 'two four');
      Map.prototype.delete.call(entry?.locations, 'one two');

      expect(Object.isFrozen(entry)).toBe(true);
      expect(Object.isFrozen(entry?.words)).toBe(true);
      expect([...(store.getEntry('untrusted', 'a')?.fragments ?? [])]).toEqual(['one two', 'two three']);
      expect(store.checkUntrustedPlagiarism()[0].matchingFragments).toEqual([['one two', 'one two']]);
    });

    it('indexes text shorter than n as an empty, valid entry', () => {
      const store = new CorpusStore({ n: 3, s: 0, metric: 'equal' });
      store.addUntrustedText('short', 'only two');
      store.addUntrustedText('long', 'only two words here');

      expect(store.getEntry('untrusted', 'short')?.fragments.size).toBe(0);
      expect(store.checkUntrustedPlagiarism()).toEqual([]);
    });
  });

  // =========================================================================
  // checkUntrustedPlagiarism
  // =========================================================================
  describe('checkUntrustedPlagiarism', () => {
    it('reports every shared fragment for identical texts', () => {
      const store = new CorpusStore({ n: 2, s: 0, metric: 'equal' });
      store.addUntrustedText('alice', 'One two, three four.');
      store.addUntrustedText('bob', 'one two three four');

      expect(store.checkUntrustedPlagiarism()).toEqual([
        {
          owner1: 'alice',
          owner2: 'bob',
          matchingFragments: [
            ['one two', 'one two'],
            ['two three', 'two three'],
            ['three four', 'three four'],
          ],
          matchingFragmentsLocations: [
            [[{ start: 0, end: 2 }], [{ start: 0, end: 2 }]],
            [[{ start: 1, end: 3 }], [{ start: 1, end: 3 }]],
            [[{ start: 2, end: 4 }], [{ start: 2, end: 4 }]],
          ],
          trustedOwner1: false,
          equalFragments: true,
        },
      ]);
    });

    it('compares each unordered pair of distinct owners exactly once', () => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'equal' });
      store.addUntrustedText('a', 'shared');
      store.addUntrustedText('b', 'shared');
      store.addUntrustedText('c', 'shared');

      const results = store.checkUntrustedPlagiarism();

      expect(results.map((r) => [r.owner1, r.owner2])).toEqual([
        ['a', 'b'],
        ['a', 'c'],
        ['b', 'c'],
      ]);
      expect(results.every((r) => r.owner1 !== r.owner2)).toBe(true);
    });

    it('omits pairs with no matching fragments', () => {
      const store = new CorpusStore({ n: 2, s: 0, metric: 'equal' });
      store.addUntrustedText('alice', 'one two three');
      store.addUntrustedText('bob', 'four five six');

      expect(store.checkUntrustedPlagiarism()).toEqual([]);
    });

    it('matches fragments at exactly the cutoff distance', () => {
      const store = new CorpusStore({ n: 1, s: 1, metric: 'levenshtein' });
      store.addUntrustedText('a', 'kitten');
      store.addUntrustedText('b', 'sitten');

      const [result] = store.checkUntrustedPlagiarism();

      expect(result.matchingFragments).toEqual([['kitten', 'sitten']]);
      expect(result.equalFragments).toBe(false);
    });

    it('does not match fragments one past the cutoff distance', () => {
      const store = new CorpusStore({ n: 1, s: 1, metric: 'levenshtein' });
      store.addUntrustedText('a', 'kitten');
      store.addUntrustedText('b', 'sittin');

      expect(store.checkUntrustedPlagiarism()).toEqual([]);
    });

    it('returns location copies that later inserts and edits cannot reach', () => {
      const store = new CorpusStore({ n: 2, s: 0, metric: 'equal' });
      store.addUntrustedText('alice', 'one two three');
      store.addUntrustedText('bob', 'one two three');

      const [result] = store.checkUntrustedPlagiarism();
      result.matchingFragmentsLocations[0][0].push({ start: 99, end: 101 });
      store.addUntrustedText('alice', 'something else entirely');

      expect(result.matchingFragmentsLocations[0][1]).toEqual([{ start: 0, end: 2 }]);
      expect(store.getEntry('untrusted', 'bob')?.locations.get('one two')).toEqual([{ start: 0, end: 2 }]);
    });
  });

  // =========================================================================
  // checkTrustedPlagiarism
  // =========================================================================
  describe('checkTrustedPlagiarism', () => {
    let store: CorpusStore;

    beforeEach(() => {
      store = new CorpusStore({ n: 2, s: 0, metric: 'equal' });
      store.addTrustedText('source', 'alpha beta gamma delta');
      store.addUntrustedText('u1', 'x alpha beta y');
      store.addUntrustedText('u2', 'gamma delta z');
    });

    it('compares every trusted owner with every untrusted owner', () => {
      expect(store.checkTrustedPlagiarism()).toEqual([
        {
          owner1: 'source',
          owner2: 'u1',
          matchingFragments: [['alpha beta', 'alpha beta']],
          matchingFragmentsLocations: [[[{ start: 0, end: 2 }], [{ start: 1, end: 3 }]]],
          trustedOwner1: true,
          equalFragments: true,
        },
        {
          owner1: 'source',
          owner2: 'u2',
          matchingFragments: [['gamma delta', 'gamma delta']],
          matchingFragmentsLocations: [[[{ start: 2, end: 4 }], [{ start: 0, end: 2 }]]],
          trustedOwner1: true,
          equalFragments: true,
        },
      ]);
    });

    it('leaves trusted texts out of the untrusted check', () => {
      expect(store.checkUntrustedPlagiarism()).toEqual([]);
    });

    it('treats the same owner ID in both partitions as separate records', () => {
      const shared = new CorpusStore({ n: 2, s: 0, metric: 'equal' });
      shared.addTrustedText('same', 'a b c');
      shared.addUntrustedText('same', 'a b c');

      const results = shared.checkTrustedPlagiarism();

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ owner1: 'same', owner2: 'same', trustedOwner1: true });
      expect(shared.checkUntrustedPlagiarism()).toEqual([]);
    });
  });

  // =========================================================================
  // getAllNormalizedText
  // =========================================================================
  describe('getAllNormalizedText', () => {
    it('lets the untrusted partition win by default', () => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'equal' });
      store.addTrustedText('same', 'Trusted words');
      store.addTrustedText('only', 'X');
      store.addUntrustedText('same', 'Untrusted words');

      const text = store.getAllNormalizedText();

      expect(text.get('same')).toEqual(['untrusted', 'words']);
      expect(text.get('only')).toEqual(['x']);
      expect(text.size).toBe(2);
    });

    it('lets the trusted partition win when configured', () => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'equal', normalizedTextPrecedence: 'trusted' });
      store.addTrustedText('same', 'Trusted words');
      store.addUntrustedText('same', 'Untrusted words');

      expect(store.getAllNormalizedText().get('same')).toEqual(['trusted', 'words']);
    });
  });

  // =========================================================================
  // comparison budget
  // =========================================================================
  describe('comparison budget', () => {
    it('abandons the in-flight pair when the fragment budget runs out', () => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'levenshtein', budget: { maxFragmentComparisons: 1 } });
      store.addUntrustedText('a', 'x y');
      store.addUntrustedText('b', 'x y');

      const outcome = store.compareUntrusted();

      expect(outcome).toEqual({ results: [], pairsCompared: 0, fragmentComparisons: 1, truncated: true });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('lets a per-call budget override the store default', () => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'levenshtein', budget: { maxFragmentComparisons: 1 } });
      store.addUntrustedText('a', 'x y');
      store.addUntrustedText('b', 'x y');

      const outcome = store.compareUntrusted({ maxFragmentComparisons: 4 });

      expect(outcome.truncated).toBe(false);
      expect(outcome.fragmentComparisons).toBe(4);
      expect(outcome.results[0].matchingFragments).toEqual([
        ['x', 'x'],
        ['y', 'y'],
      ]);
    });

    it('returns nothing when the signal is already aborted', () => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'equal' });
      store.addUntrustedText('a', 'x');
      store.addUntrustedText('b', 'x');
      const controller = new AbortController();
      controller.abort();

      const outcome = store.compareUntrusted({ signal: controller.signal });

      expect(outcome.truncated).toBe(true);
      expect(outcome.results).toEqual([]);
    });

    it('keeps results gathered before the deadline passed', () => {
      const clock = [0, 5, 50];
      const store = new CorpusStore({ n: 1, s: 0, metric: 'equal' }, () => clock.shift() ?? 50);
      store.addUntrustedText('a', 'shared');
      store.addUntrustedText('b', 'shared');
      store.addUntrustedText('c', 'shared');

      const outcome = store.compareUntrusted({ deadlineMs: 10 });

      expect(outcome.truncated).toBe(true);
      expect(outcome.pairsCompared).toBe(1);
      expect(outcome.results.map((r) => [r.owner1, r.owner2])).toEqual([['a', 'b']]);
    });

    it.each([
      [{ maxFragmentComparisons: Number.NaN }],
      [{ maxFragmentComparisons: 0 }],
      [{ deadlineMs: -1 }],
      [{ deadlineMs: 1.5 }],
    ])('rejects the per-call budget %o', (budget) => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'levenshtein' });
      store.addUntrustedText('a', 'x y');
      store.addUntrustedText('b', 'x y');

      const error = captureError(() => store.compareUntrusted(budget));

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: 'INVALID_CORPUS_CONFIG' });
    });

    it('keeps the store default for a per-call key left undefined', () => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'levenshtein', budget: { maxFragmentComparisons: 1 } });
      store.addUntrustedText('a', 'x y');
      store.addUntrustedText('b', 'x y');

      const outcome = store.compareUntrusted({ maxFragmentComparisons: undefined });

      expect(outcome).toEqual({ results: [], pairsCompared: 0, fragmentComparisons: 1, truncated: true });
    });

    it('never changes stored entries when stopped early', () => {
      const store = new CorpusStore({ n: 1, s: 0, metric: 'levenshtein' });
      store.addUntrustedText('a', 'x y');
      store.addUntrustedText('b', 'x y');

      store.compareUntrusted({ maxFragmentComparisons: 1 });

      expect(store.compareUntrusted().results).toHaveLength(1);
      expect(store.getEntry('untrusted', 'a')?.fragments.size).toBe(2);
    });
  });
});
