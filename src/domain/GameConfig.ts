import type { BoostKind, Difficulty, TitleId } from "./typedefs.js";

export interface LengthProgression {
  readonly base: number;
  readonly max: number;
  /** Required length grows by one every this many rounds */
  readonly every: number;
}

export interface BoostRules {
  readonly cost: number;
  readonly cooldownMs: number;
  /** Uses allowed per player per session; undefined means unlimited */
  readonly sessionCap: number | undefined;
}

export type RuleTitleId = Exclude<TitleId, "KAMI">;

export interface GameConfig {
  readonly minPlayers: number;
  readonly turnBaseSeconds: number;
  readonly turnStepSeconds: number;
  readonly turnMinSeconds: number;
  readonly comboStreak: number;
  readonly hintCount: number;
  readonly startingBalance: number;
  readonly progression: Readonly<Record<Difficulty, LengthProgression>>;
  readonly boosts: Readonly<Record<BoostKind, BoostRules>>;
  readonly achievementThresholds: Readonly<Record<RuleTitleId, number>>;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    minPlayers: overrides.minPlayers ?? 2,
    turnBaseSeconds: overrides.turnBaseSeconds ?? 60,
    turnStepSeconds: overrides.turnStepSeconds ?? 5,
    turnMinSeconds: overrides.turnMinSeconds ?? 20,
    comboStreak: overrides.comboStreak ?? 3,
    hintCount: overrides.hintCount ?? 3,
    startingBalance: overrides.startingBalance ?? 0,
    progression: overrides.progression ?? {
      easy: { base: 3, max: 10, every: 3 },
      medium: { base: 3, max: 15, every: 2 },
      hard: { base: 4, max: 20, every: 1 },
    },
    boosts: overrides.boosts ?? {
      hint: { cost: 80, cooldownMs: 120_000, sessionCap: undefined },
      skip: { cost: 150, cooldownMs: 180_000, sessionCap: 3 },
      rebound: { cost: 250, cooldownMs: 0, sessionCap: undefined },
    },
    achievementThresholds: overrides.achievementThresholds ?? {
      LEGEND: 1000,
      WARRIOR: 10,
      SAGE: 50,
      PHOENIX: 10,
      SHADOW: 12,
    },
  };
}
