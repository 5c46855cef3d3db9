import type { GameConfig } from "../GameConfig.js";
import type { CommandContext } from "../commands/Command.js";
import { achievementProgress, type AchievementProgress } from "../entities/Achievements.js";
import { cooldownRemaining } from "../entities/BoostLedger.js";
import { topPlayers, type LeaderboardEntry } from "../entities/Leaderboard.js";
import type { PlayerStats } from "../ports/PlayerGateway.js";
import {
  BOOST_KINDS,
  TITLE_IDS,
  type BoostKind,
  type LeaderboardCategory,
  type PlayerId,
  type TimePoint,
  type TitleId,
} from "../typedefs.js";

type PlayerReadContext = Pick<CommandContext, "playerGateway">;

export interface PlayerProfile {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly title: TitleId | undefined;
  readonly balance: number;
  readonly titles: readonly TitleId[];
  readonly stats: Readonly<PlayerStats>;
}

export interface AchievementSummary {
  readonly playerId: PlayerId;
  readonly unlocked: readonly TitleId[];
  readonly locked: readonly TitleId[];
  readonly equippedTitle: TitleId | undefined;
}

export interface ShopItem {
  readonly boost: BoostKind;
  readonly cost: number;
  readonly cooldownMs: number;
  readonly sessionCap: number | undefined;
}

export interface InventoryItem {
  readonly boost: BoostKind;
  readonly owned: number;
  readonly cooldownRemainingMs: number;
}

export interface Inventory {
  readonly playerId: PlayerId;
  readonly balance: number;
  readonly items: readonly InventoryItem[];
}

export async function getPlayerStats(
  { playerGateway }: PlayerReadContext,
  playerId: PlayerId,
): Promise<Readonly<PlayerStats>> {
  const player = await playerGateway.loadPlayer(playerId);
  return { ...player.stats };
}

export async function getProfile(
  { playerGateway }: PlayerReadContext,
  playerId: PlayerId,
): Promise<PlayerProfile> {
  const player = await playerGateway.loadPlayer(playerId);
  return {
    playerId: player.id,
    displayName: player.displayName,
    title: player.equippedTitle,
    balance: player.balance,
    titles: [...player.titles],
    stats: { ...player.stats },
  };
}

export async function getAchievements(
  { playerGateway }: PlayerReadContext,
  playerId: PlayerId,
): Promise<AchievementSummary> {
  const player = await playerGateway.loadPlayer(playerId);
  return {
    playerId: player.id,
    unlocked: [...player.titles],
    locked: TITLE_IDS.filter((title) => !player.titles.includes(title)),
    equippedTitle: player.equippedTitle,
  };
}

export async function getProgress(
  { playerGateway, config }: PlayerReadContext & Pick<CommandContext, "config">,
  playerId: PlayerId,
): Promise<AchievementProgress[]> {
  const player = await playerGateway.loadPlayer(playerId);
  return achievementProgress(player, config);
}

export function getShop(config: GameConfig): ShopItem[] {
  return BOOST_KINDS.map((boost) => ({ boost, ...config.boosts[boost] }));
}

export async function getInventory(
  { playerGateway, config }: PlayerReadContext & Pick<CommandContext, "config">,
  playerId: PlayerId,
  at: TimePoint,
): Promise<Inventory> {
  const player = await playerGateway.loadPlayer(playerId);
  return {
    playerId: player.id,
    balance: player.balance,
    items: BOOST_KINDS.map((boost) => ({
      boost,
      owned: player.inventory[boost],
      cooldownRemainingMs: cooldownRemaining(player, boost, at, config),
    })),
  };
}

/** Read-only ranking over cumulative stats. */
export async function getLeaderboard(
  { playerGateway }: PlayerReadContext,
  category: LeaderboardCategory,
  limit = 10,
): Promise<LeaderboardEntry[]> {
  const players = await playerGateway.listPlayers();
  return topPlayers(players, category, limit);
}
