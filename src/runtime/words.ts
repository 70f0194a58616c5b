/**
 * Word sets, the only runtime value in WordLang.
 * Every operation returns a fresh set; inputs are never mutated.
 */

export type WordSet = ReadonlySet<string>;

export type PrintFormat = 'legacy' | 'plain';

export const PRINT_FORMATS: readonly PrintFormat[] = ['legacy', 'plain'];

export const EMPTY_WORDS: WordSet = new Set<string>();

export function wordSet(words: Iterable<string>): WordSet {
  return new Set(words);
}

export function union(left: WordSet, right: WordSet): WordSet {
  const out = new Set(left);
  for (const word of right) out.add(word);
  return out;
}

/** Words of `left` that are not in `right`. */
export function difference(left: WordSet, right: WordSet): WordSet {
  const out = new Set<string>();
  for (const word of left) {
    if (!right.has(word)) out.add(word);
  }
  return out;
}

/** True when any pattern occurs as a substring of `word`. */
export function matchesAny(word: string, patterns: WordSet): boolean {
  for (const pattern of patterns) {
    if (word.includes(pattern)) return true;
  }
  return false;
}

/** Keep matching words, or with `exclude` keep the words that match nothing. */
export function filterWords(words: WordSet, patterns: WordSet, exclude = false): WordSet {
  const out = new Set<string>();
  for (const word of words) {
    if (matchesAny(word, patterns) !== exclude) out.add(word);
  }
  return out;
}

/** Split text on whitespace into words. */
export function splitWords(text: string): string[] {
  return text.split(/[ \t\n\v\f\r]+/).filter(word => word.length > 0);
}

export function sortedWords(words: WordSet): string[] {
  return [...words].sort();
}

/**
 * Render a set for `print`. The legacy form puts a comma before every word,
 * the first one included: `[,cat,dog ]`.
 */
export function formatWords(words: WordSet, format: PrintFormat = 'legacy'): string {
  const sorted = sortedWords(words);
  if (format === 'plain') {
    return `[${sorted.join(', ')}]`;
  }
  return `[${sorted.map(word => ',' + word).join('')} ]`;
}
