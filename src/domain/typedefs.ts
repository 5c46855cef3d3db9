/**
 * Core domain typedefs used throughout the game.
 * These are simple aliases for now; they can later evolve into
 * branded types for stronger compile-time safety.
 */

/** Identifier of the chat a session lives in */
export type ChatId = string;

/** Platform user identifier of a player */
export type PlayerId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Session lifecycle phase */
export type SessionPhase = "lobby" | "active" | "practice" | "stopped";

/** Phase of the live turn inside an active or practice session */
export type TurnPhase = "awaiting" | "resolving";

export type Difficulty = "easy" | "medium" | "hard";

export type BoostKind = "hint" | "skip" | "rebound";

export type TitleId = "LEGEND" | "WARRIOR" | "SAGE" | "PHOENIX" | "SHADOW" | "KAMI";

export type LeaderboardCategory = "score" | "words" | "streak" | "longest" | "wins";

export const DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];
export const BOOST_KINDS: readonly BoostKind[] = ["hint", "skip", "rebound"];
export const TITLE_IDS: readonly TitleId[] = [
  "LEGEND",
  "WARRIOR",
  "SAGE",
  "PHOENIX",
  "SHADOW",
  "KAMI",
];
export const LEADERBOARD_CATEGORIES: readonly LeaderboardCategory[] = [
  "score",
  "words",
  "streak",
  "longest",
  "wins",
];

export function isDifficulty(value: unknown): value is Difficulty {
  return DIFFICULTIES.some((difficulty) => difficulty === value);
}

export function isTitleId(value: unknown): value is TitleId {
  return TITLE_IDS.some((title) => title === value);
}

export function isBoostKind(value: unknown): value is BoostKind {
  return BOOST_KINDS.some((boost) => boost === value);
}

export function isLeaderboardCategory(value: unknown): value is LeaderboardCategory {
  return LEADERBOARD_CATEGORIES.some((category) => category === value);
}
