import type { PlayerRecord } from "../ports/PlayerGateway.js";
import type { LeaderboardCategory, PlayerId, TitleId } from "../typedefs.js";

export interface LeaderboardEntry {
  readonly rank: number;
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly title: TitleId | undefined;
  readonly value: number;
}

export function statFor(player: PlayerRecord, category: LeaderboardCategory): number {
  switch (category) {
    case "score":
      return player.stats.totalScore;
    case "words":
      return player.stats.totalWords;
    case "streak":
      return player.stats.bestStreak;
    case "longest":
      return player.stats.longestWordLength;
    case "wins":
      return player.stats.gamesWon;
  }
}

export function topPlayers(
  players: readonly PlayerRecord[],
  category: LeaderboardCategory,
  limit: number,
): LeaderboardEntry[] {
  return players
    .map((player) => ({ player, value: statFor(player, category) }))
    .sort((a, b) =>
      b.value !== a.value ? b.value - a.value : a.player.id.localeCompare(b.player.id),
    )
    .slice(0, Math.max(0, limit))
    .map(({ player, value }, index) => ({
      rank: index + 1,
      playerId: player.id,
      displayName: player.displayName,
      title: player.equippedTitle,
      value,
    }));
}
