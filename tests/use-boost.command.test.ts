import { describe, expect, it } from "vitest";

import { UseBoost } from "../src/domain/commands/UseBoost.js";
import { createCommandContext, makeActiveSession } from "./support/mocks.js";

const ONE_SKIP = { inventory: { hint: 0, skip: 1, rebound: 0 } };

describe("UseBoost command", () => {
  it("passes the turn without elimination and records the use", async () => {
    const context = createCommandContext();
    const { sessionGateway, playerGateway } = context;
    playerGateway.seed("alice", ONE_SKIP);
    playerGateway.seed("bob");
    sessionGateway.loadSession.mockResolvedValue(makeActiveSession());
    sessionGateway.claimTurn.mockResolvedValue(true);

    const report = await new UseBoost("chat-1", "alice", "skip", 5_000).execute(context);

    expect(report?.outcome).toEqual({ type: "Skipped" });
    expect(report?.eliminated).toBeUndefined();
    expect(report?.next).toMatchObject({ sequence: 2, playerId: "bob", deadline: 60_000 });

    const alice = playerGateway.players.get("alice");
    expect(alice?.inventory.skip).toBe(0);
    expect(alice?.cooldowns.skip).toBe(5_000);
    expect(alice?.stats.skipsUsed).toBe(1);
    expect(sessionGateway.saveSession).toHaveBeenCalledWith(
      expect.objectContaining({ skipsUsed: { alice: 1, bob: 0 }, usedWords: [] }),
    );
  });

  it("refunds the boost when a competing event already claimed the turn", async () => {
    const context = createCommandContext();
    const { sessionGateway, playerGateway, bus } = context;
    playerGateway.seed("alice", ONE_SKIP);
    sessionGateway.loadSession.mockResolvedValue(makeActiveSession());
    sessionGateway.claimTurn.mockResolvedValue(false);

    const report = await new UseBoost("chat-1", "alice", "skip", 5_000).execute(context);

    expect(report).toBeNull();
    const alice = playerGateway.players.get("alice");
    expect(alice?.inventory.skip).toBe(1);
    expect(alice?.cooldowns).toEqual({});
    expect(alice?.stats.skipsUsed).toBe(0);
    expect(playerGateway.updates).toEqual(["alice", "alice"]);
    expect(bus.publish).not.toHaveBeenCalled();
  });

  it("enforces the per-session cap before touching the inventory", async () => {
    const context = createCommandContext();
    const { sessionGateway, playerGateway } = context;
    playerGateway.seed("alice", ONE_SKIP);
    sessionGateway.loadSession.mockResolvedValue(
      makeActiveSession({ skipsUsed: { alice: 3, bob: 0 } }),
    );

    await expect(
      new UseBoost("chat-1", "alice", "skip", 5_000).execute(context),
    ).rejects.toMatchObject({ kind: "EconomyError", code: "SessionCapExceeded", boost: "skip" });

    expect(sessionGateway.claimTurn).not.toHaveBeenCalled();
    expect(playerGateway.players.get("alice")?.inventory.skip).toBe(1);
  });

  it("is disabled in practice", async () => {
    const context = createCommandContext();
    const { sessionGateway, playerGateway } = context;
    playerGateway.seed("alice", ONE_SKIP);
    sessionGateway.loadSession.mockResolvedValue(
      makeActiveSession({ phase: "practice", players: ["alice"], participants: ["alice"] }),
    );

    await expect(
      new UseBoost("chat-1", "alice", "skip", 5_000).execute(context),
    ).rejects.toMatchObject({ kind: "StateError", code: "BoostsDisabledInPractice" });
    expect(playerGateway.updates).toEqual([]);
  });
});
