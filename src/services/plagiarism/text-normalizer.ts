/**
 * Text Normalization
 *
 * Turns raw text into the word sequence fragments are built from.
 * Same input always yields the same words.
 */

// Combining marks stay: they carry decomposed accents and vowel signs
const STRIP_REGEX = /[^\p{L}\p{M}\p{N}\s]+/gu;

/**
 * NFC-compose, lower-case, drop punctuation and split on whitespace.
 * E.g., "The quick, brown fox!" → ["the", "quick", "brown", "fox"]
 */
export function normalizeText(text: string): string[] {
  return text
    .normalize('NFC')
    .toLowerCase()
    .replace(STRIP_REGEX, '')
    .split(/\s+/)
    .filter(Boolean);
}

/**
 * Word n-grams joined by a single space, element i starting at word i.
 * Length is max(0, words.length - n + 1).
 */
export function wordNgrams(words: readonly string[], n: number): string[] {
  const ngrams: string[] = [];
  for (let i = 0; i <= words.length - n; i++) {
    ngrams.push(words.slice(i, i + n).join(' '));
  }
  return ngrams;
}
