import type { Dictionary } from "../ports/Dictionary.js";

const WORD_PATTERN = /^[a-z]+$/;

export function normalizeToken(raw: string): string {
  return raw.trim().toLowerCase();
}

export function isAlphabeticWord(word: string): boolean {
  return WORD_PATTERN.test(word);
}

/**
 * In-memory dictionary. The letter/length index is built once at construction; entries that are
 * not purely alphabetic after normalisation are dropped.
 */
export class WordDictionary implements Dictionary {
  readonly #words: Set<string>;
  readonly #index = new Map<number, Map<string, string[]>>();

  constructor(words: Iterable<string>) {
    this.#words = new Set<string>();
    for (const raw of words) {
      const word = normalizeToken(raw);
      if (isAlphabeticWord(word)) {
        this.#words.add(word);
      }
    }

    for (const word of [...this.#words].sort()) {
      let byLetter = this.#index.get(word.length);
      if (!byLetter) {
        byLetter = new Map<string, string[]>();
        this.#index.set(word.length, byLetter);
      }
      const letter = word.charAt(0);
      const bucket = byLetter.get(letter);
      if (bucket) {
        bucket.push(word);
      } else {
        byLetter.set(letter, [word]);
      }
    }
  }

  get size(): number {
    return this.#words.size;
  }

  has(word: string): boolean {
    return this.#words.has(word);
  }

  candidates(letter: string, length: number): readonly string[] {
    return this.#index.get(length)?.get(letter) ?? [];
  }

  lettersFor(length: number): readonly string[] {
    const byLetter = this.#index.get(length);
    if (!byLetter) return [];
    return [...byLetter.keys()].sort();
  }
}
