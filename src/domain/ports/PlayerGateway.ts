/* eslint-disable functional/prefer-readonly-type */
import type { BoostKind, PlayerId, TimePoint, TitleId } from "../typedefs.js";

export interface PlayerStats {
  totalScore: number;
  totalWords: number;
  longestWord: string | undefined;
  longestWordLength: number;
  bestStreak: number;
  gamesCompleted: number;
  gamesWon: number;
  hintsUsed: number;
  skipsUsed: number;
  reboundsUsed: number;
}

export interface PlayerRecord {
  readonly id: PlayerId;
  displayName: string;
  stats: PlayerStats;
  balance: number;
  inventory: Record<BoostKind, number>;
  /** Time of the last use per boost */
  cooldowns: Partial<Record<BoostKind, TimePoint>>;
  titles: TitleId[];
  equippedTitle: TitleId | undefined;
  readonly createdAt: TimePoint;
}

export interface PlayerUpdate<TResult> {
  /** Snapshot of the record after the update */
  readonly player: PlayerRecord;
  readonly result: TResult;
}

export interface PlayerGateway {
  /** Load a player; fails with `PlayerNotFoundError` when unknown. */
  loadPlayer(playerId: PlayerId): Promise<PlayerRecord>;

  /**
   * Create the player on first interaction, or refresh the display name of a known one.
   */
  ensurePlayer(
    playerId: PlayerId,
    displayName: string,
    at: TimePoint,
  ): Promise<PlayerRecord>;

  /**
   * Atomic read-modify-write. The mutator runs against the stored record without yielding;
   * if it throws, nothing is written and the error propagates.
   */
  updatePlayer<TResult>(
    playerId: PlayerId,
    mutate: (player: PlayerRecord) => TResult,
  ): Promise<PlayerUpdate<TResult>>;

  listPlayers(): Promise<readonly PlayerRecord[]>;
}
