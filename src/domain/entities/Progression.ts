import type { GameConfig } from "../GameConfig.js";
import type { Difficulty } from "../typedefs.js";

/**
 * Required word length for a 1-based round: `min(max, base + floor((round - 1) / every))`.
 */
export function requiredLength(
  difficulty: Difficulty,
  round: number,
  config: GameConfig,
): number {
  const { base, max, every } = config.progression[difficulty];
  const steps = Math.floor((Math.max(1, round) - 1) / every);
  return Math.min(max, base + steps);
}

/** Turn clock: `max(min, base - step * round)` seconds, in milliseconds. */
export function turnDurationMs(round: number, config: GameConfig): number {
  const seconds = Math.max(
    config.turnMinSeconds,
    config.turnBaseSeconds - config.turnStepSeconds * round,
  );
  return seconds * 1000;
}
