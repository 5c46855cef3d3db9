import { describe, expect, it } from "vitest";

import {
  consumeBoost,
  cooldownRemaining,
  purchaseBoost,
  refundBoost,
} from "../../src/domain/entities/BoostLedger.js";
import { createPlayerRecord } from "../../src/domain/entities/Players.js";
import { EconomyError } from "../../src/domain/errors/EconomyError.js";
import { createGameConfig } from "../../src/domain/GameConfig.js";
import type { PlayerRecord } from "../../src/domain/ports/PlayerGateway.js";

const config = createGameConfig();

function player(balance: number, inventory: Partial<PlayerRecord["inventory"]> = {}): PlayerRecord {
  const record = createPlayerRecord("alice", "Alice", 0, balance);
  record.inventory = { ...record.inventory, ...inventory };
  return record;
}

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("purchaseBoost", () => {
  it("deducts the cost and adds one to the inventory", () => {
    const record = player(200);
    purchaseBoost(record, "skip", config);
    expect(record.balance).toBe(50);
    expect(record.inventory.skip).toBe(1);
  });

  it("fails with InsufficientPoints below the cost", () => {
    const record = player(79);
    const error = captureError(() => purchaseBoost(record, "hint", config));
    expect(error).toBeInstanceOf(EconomyError);
    expect(error).toMatchObject({ code: "InsufficientPoints", boost: "hint" });
    expect(record.balance).toBe(79);
    expect(record.inventory.hint).toBe(0);
  });
});

describe("consumeBoost", () => {
  it("fails with NotOwned when the inventory is empty", () => {
    const error = captureError(() => consumeBoost(player(0), "skip", 0, 0, config));
    expect(error).toMatchObject({ code: "NotOwned", boost: "skip" });
  });

  it("checks the session cap before ownership", () => {
    const error = captureError(() => consumeBoost(player(0, { skip: 2 }), "skip", 0, 3, config));
    expect(error).toMatchObject({ code: "SessionCapExceeded", boost: "skip" });
  });

  it("stamps the cooldown and blocks reuse until it elapses", () => {
    const record = player(0, { hint: 2 });
    expect(consumeBoost(record, "hint", 1_000, 0, config)).toEqual({
      boost: "hint",
      previousUse: undefined,
    });
    expect(record.inventory.hint).toBe(1);
    expect(record.cooldowns.hint).toBe(1_000);

    const error = captureError(() => consumeBoost(record, "hint", 31_000, 0, config));
    expect(error).toMatchObject({ code: "OnCooldown", retryAfterMs: 90_000 });

    expect(consumeBoost(record, "hint", 121_000, 0, config)).toEqual({
      boost: "hint",
      previousUse: 1_000,
    });
    expect(record.inventory.hint).toBe(0);
  });

  it("never puts rebounds on cooldown", () => {
    const record = player(0, { rebound: 2 });
    consumeBoost(record, "rebound", 5_000, 0, config);
    expect(cooldownRemaining(record, "rebound", 5_000, config)).toBe(0);
    expect(() => consumeBoost(record, "rebound", 5_000, 10, config)).not.toThrow();
  });
});

describe("refundBoost", () => {
  it("restores the inventory and the previous cooldown stamp", () => {
    const record = player(0, { skip: 1 });
    const receipt = consumeBoost(record, "skip", 10_000, 0, config);
    refundBoost(record, receipt);
    expect(record.inventory.skip).toBe(1);
    expect(record.cooldowns.skip).toBeUndefined();
  });
});
