import { GameCommandInputError } from "../errors/GameCommandInputError.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidId(id: unknown): id is string {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

/** Throws a {@link GameCommandInputError} listing every malformed identifier. */
export function assertValidIds(ids: Readonly<Record<string, unknown>>): void {
  const issues = Object.entries(ids)
    .filter(([, value]) => !isValidId(value))
    .map(([name]) => `${name} must be a non-empty string without whitespace`);

  if (issues.length > 0) {
    throw GameCommandInputError.because(issues);
  }
}

export function displayNameOr(displayName: string, fallback: string): string {
  const trimmed = displayName.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}
