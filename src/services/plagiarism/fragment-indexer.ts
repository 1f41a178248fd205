/**
 * Fragment Indexer
 *
 * Builds the unique fragment set and the fragment → locations map for one text.
 * Positions are only known while walking the n-gram sequence, so both
 * structures are filled in the same pass.
 */

import { FragmentIndex, FragmentLocation, OwnerID, TextEntry } from '../../types/corpus.types';
import { wordNgrams } from './text-normalizer';

export function indexFragments(words: readonly string[], n: number): FragmentIndex {
  const fragments = new Set<string>();
  const locations = new Map<string, FragmentLocation[]>();

  wordNgrams(words, n).forEach((fragment, start) => {
    const location: FragmentLocation = Object.freeze({ start, end: start + n });
    const existing = locations.get(fragment);
    if (existing) {
      existing.push(location);
    } else {
      fragments.add(fragment);
      locations.set(fragment, [location]);
    }
  });

  return { fragments, locations };
}

/**
 * Build the frozen per-owner entry stored in a corpus partition.
 */
export function buildTextEntry(owner: OwnerID, words: readonly string[], n: number): TextEntry {
  const { fragments, locations } = indexFragments(words, n);
  for (const list of locations.values()) {
    Object.freeze(list);
  }

  return Object.freeze({
    owner,
    words: Object.freeze([...words]),
    fragments,
    locations,
  });
}
