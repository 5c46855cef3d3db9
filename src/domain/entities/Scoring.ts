import type { GameConfig } from "../GameConfig.js";
import type { PlayerRecord } from "../ports/PlayerGateway.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { BoostKind, PlayerId } from "../typedefs.js";

export interface AcceptedScore {
  readonly points: number;
  readonly streak: number;
  readonly combo: boolean;
}

/** Points are exactly the word length; a combo is presentation only. */
export function scoreAcceptedWord(
  state: SessionState,
  playerId: PlayerId,
  word: string,
  config: GameConfig,
): AcceptedScore {
  const points = word.length;
  const streak = (state.streaks[playerId] ?? 0) + 1;

  state.scores[playerId] = (state.scores[playerId] ?? 0) + points;
  state.streaks[playerId] = streak;

  return { points, streak, combo: streak >= config.comboStreak };
}

export function resetStreak(state: SessionState, playerId: PlayerId): void {
  state.streaks[playerId] = 0;
}

/** Cumulative bookkeeping for an accepted word in a multiplayer game. */
export function recordAcceptedWord(
  player: PlayerRecord,
  word: string,
  streak: number,
): void {
  const { stats } = player;
  stats.totalScore += word.length;
  stats.totalWords += 1;
  player.balance += word.length;

  if (word.length > stats.longestWordLength) {
    stats.longestWord = word;
    stats.longestWordLength = word.length;
  }

  if (streak > stats.bestStreak) {
    stats.bestStreak = streak;
  }
}

export function recordBoostUse(player: PlayerRecord, boost: BoostKind): void {
  switch (boost) {
    case "hint":
      player.stats.hintsUsed += 1;
      return;
    case "skip":
      player.stats.skipsUsed += 1;
      return;
    case "rebound":
      player.stats.reboundsUsed += 1;
      return;
  }
}

export function recordGameCompleted(player: PlayerRecord, won: boolean): void {
  player.stats.gamesCompleted += 1;
  if (won) player.stats.gamesWon += 1;
}
