import type { PlayerRecord, PlayerStats } from "../ports/PlayerGateway.js";
import type { PlayerId, TimePoint } from "../typedefs.js";

export function emptyStats(): PlayerStats {
  return {
    totalScore: 0,
    totalWords: 0,
    longestWord: undefined,
    longestWordLength: 0,
    bestStreak: 0,
    gamesCompleted: 0,
    gamesWon: 0,
    hintsUsed: 0,
    skipsUsed: 0,
    reboundsUsed: 0,
  };
}

export function createPlayerRecord(
  id: PlayerId,
  displayName: string,
  createdAt: TimePoint,
  startingBalance = 0,
): PlayerRecord {
  return {
    id,
    displayName,
    stats: emptyStats(),
    balance: startingBalance,
    inventory: { hint: 0, skip: 0, rebound: 0 },
    cooldowns: {},
    titles: [],
    equippedTitle: undefined,
    createdAt,
  };
}
