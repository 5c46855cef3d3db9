import type { Dictionary } from "../ports/Dictionary.js";
import type { Constraint } from "../ports/SessionGateway.js";
import type { RejectionReason } from "../outcomes.js";
import { isAlphabeticWord, normalizeToken } from "./WordDictionary.js";

export type ValidationResult =
  | { readonly ok: true; readonly word: string }
  | { readonly ok: false; readonly reason: RejectionReason };

/**
 * Runs the submission pipeline, stopping at the first failing check:
 * normalise, length, first letter, repetition, dictionary.
 */
export function validateWord(
  constraint: Constraint,
  usedWords: readonly string[],
  dictionary: Dictionary,
  raw: string,
): ValidationResult {
  const word = normalizeToken(raw);

  if (word.length === 0 || !isAlphabeticWord(word)) {
    return { ok: false, reason: "Empty" };
  }

  if (word.length !== constraint.length) {
    return { ok: false, reason: "WrongLength" };
  }

  if (word.charAt(0) !== constraint.letter) {
    return { ok: false, reason: "WrongLetter" };
  }

  if (usedWords.includes(word)) {
    return { ok: false, reason: "AlreadyUsed" };
  }

  if (!dictionary.has(word)) {
    return { ok: false, reason: "NotAWord" };
  }

  return { ok: true, word };
}
