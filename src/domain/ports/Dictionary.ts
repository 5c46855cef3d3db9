/**
 * Read-only word oracle. Words are lower-case `a-z` strings.
 */
export interface Dictionary {
  readonly size: number;
  has(word: string): boolean;
  /** Words of the given first letter and length, sorted lexicographically. */
  candidates(letter: string, length: number): readonly string[];
  /** Letters with at least one word of the given length, sorted. */
  lettersFor(length: number): readonly string[];
}
