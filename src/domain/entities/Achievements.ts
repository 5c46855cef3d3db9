import type { GameConfig, RuleTitleId } from "../GameConfig.js";
import { AchievementError } from "../errors/AchievementError.js";
import type { PlayerRecord, PlayerStats } from "../ports/PlayerGateway.js";
import type { TitleId } from "../typedefs.js";

/** Stat each rule title is measured against. KAMI has no rule and is granted by an admin. */
const RULE_STATS: Readonly<Record<RuleTitleId, (stats: PlayerStats) => number>> = {
  LEGEND: (stats) => stats.totalScore,
  WARRIOR: (stats) => stats.bestStreak,
  SAGE: (stats) => stats.totalWords,
  PHOENIX: (stats) => stats.gamesCompleted,
  SHADOW: (stats) => stats.longestWordLength,
};

const RULE_TITLES: readonly RuleTitleId[] = ["LEGEND", "WARRIOR", "SAGE", "PHOENIX", "SHADOW"];

export interface AchievementProgress {
  readonly title: RuleTitleId;
  readonly current: number;
  readonly target: number;
  readonly unlocked: boolean;
}

/** Unlocks every rule title the stats now satisfy. Returns only the newly unlocked ones. */
export function evaluateAchievements(player: PlayerRecord, config: GameConfig): TitleId[] {
  const unlocked: TitleId[] = [];
  for (const title of RULE_TITLES) {
    if (player.titles.includes(title)) continue;
    if (RULE_STATS[title](player.stats) >= config.achievementThresholds[title]) {
      player.titles.push(title);
      unlocked.push(title);
    }
  }
  return unlocked;
}

export function achievementProgress(
  player: PlayerRecord,
  config: GameConfig,
): AchievementProgress[] {
  return RULE_TITLES.map((title) => {
    const target = config.achievementThresholds[title];
    return {
      title,
      current: Math.min(RULE_STATS[title](player.stats), target),
      target,
      unlocked: player.titles.includes(title),
    };
  });
}

export function equipTitle(player: PlayerRecord, title: TitleId): void {
  if (!player.titles.includes(title)) {
    throw new AchievementError(title);
  }
  player.equippedTitle = title;
}

/** Out-of-band grant; returns false when the player already had the title. */
export function grantTitle(player: PlayerRecord, title: TitleId): boolean {
  if (player.titles.includes(title)) return false;
  player.titles.push(title);
  return true;
}
