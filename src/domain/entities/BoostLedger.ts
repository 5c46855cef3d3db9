import type { GameConfig } from "../GameConfig.js";
import { EconomyError } from "../errors/EconomyError.js";
import type { PlayerRecord } from "../ports/PlayerGateway.js";
import type { BoostKind, TimePoint } from "../typedefs.js";

export function purchaseBoost(player: PlayerRecord, boost: BoostKind, config: GameConfig): void {
  const { cost } = config.boosts[boost];
  if (player.balance < cost) {
    throw EconomyError.insufficientPoints(boost, cost, player.balance);
  }
  player.balance -= cost;
  player.inventory[boost] += 1;
}

export function cooldownRemaining(
  player: PlayerRecord,
  boost: BoostKind,
  at: TimePoint,
  config: GameConfig,
): number {
  const lastUse = player.cooldowns[boost];
  if (lastUse === undefined) return 0;
  return Math.max(0, lastUse + config.boosts[boost].cooldownMs - at);
}

/**
 * Throws the first reason the boost cannot be used: session cap, ownership, cooldown.
 * `sessionUses` is the player's count for this boost in the current session.
 */
export function assertCanUseBoost(
  player: PlayerRecord,
  boost: BoostKind,
  at: TimePoint,
  sessionUses: number,
  config: GameConfig,
): void {
  const { sessionCap } = config.boosts[boost];
  if (sessionCap !== undefined && sessionUses >= sessionCap) {
    throw EconomyError.sessionCapExceeded(boost, sessionCap);
  }

  if (player.inventory[boost] <= 0) {
    throw EconomyError.notOwned(boost);
  }

  const remaining = cooldownRemaining(player, boost, at, config);
  if (remaining > 0) {
    throw EconomyError.onCooldown(boost, remaining);
  }
}

export interface BoostReceipt {
  readonly boost: BoostKind;
  /** Cooldown stamp before this use, restored on refund */
  readonly previousUse: TimePoint | undefined;
}

export function consumeBoost(
  player: PlayerRecord,
  boost: BoostKind,
  at: TimePoint,
  sessionUses: number,
  config: GameConfig,
): BoostReceipt {
  assertCanUseBoost(player, boost, at, sessionUses, config);
  const previousUse = player.cooldowns[boost];
  player.inventory[boost] -= 1;
  player.cooldowns[boost] = at;
  return { boost, previousUse };
}

export function refundBoost(player: PlayerRecord, receipt: BoostReceipt): void {
  player.inventory[receipt.boost] += 1;
  if (receipt.previousUse === undefined) {
    delete player.cooldowns[receipt.boost];
  } else {
    player.cooldowns[receipt.boost] = receipt.previousUse;
  }
}
