import { describe, expect, it, vi } from "vitest";

import { BeginGame } from "../src/domain/commands/BeginGame.js";
import { BeginPractice } from "../src/domain/commands/BeginPractice.js";
import { BuyBoost } from "../src/domain/commands/BuyBoost.js";
import { EquipTitle } from "../src/domain/commands/EquipTitle.js";
import { Forfeit } from "../src/domain/commands/Forfeit.js";
import { GrantTitle } from "../src/domain/commands/GrantTitle.js";
import { JoinLobby } from "../src/domain/commands/JoinLobby.js";
import { OpenLobby } from "../src/domain/commands/OpenLobby.js";
import { RequestHint } from "../src/domain/commands/RequestHint.js";
import { StopSession } from "../src/domain/commands/StopSession.js";
import { SubmitWord } from "../src/domain/commands/SubmitWord.js";
import { TurnTimeout } from "../src/domain/commands/TurnTimeout.js";
import { UseBoost } from "../src/domain/commands/UseBoost.js";
import type { GameConfigOverrides } from "../src/domain/GameConfig.js";
import { getInventory, getLeaderboard } from "../src/domain/queries/PlayerQueries.js";
import { getSessionStatus } from "../src/domain/queries/SessionQueries.js";
import { createHarness, type Harness } from "./support/harness.js";

async function startDuel(config?: GameConfigOverrides): Promise<Harness> {
  const harness = createHarness({ config });
  await harness.run(new OpenLobby("chat-1", "alice", "Alice", harness.now()));
  await harness.run(new JoinLobby("chat-1", "bob", "Bob", harness.now()));
  await harness.run(new BeginGame("chat-1", "alice", harness.now()));
  return harness;
}

describe("multiplayer game", () => {
  it("plays to a winner when the last opponent times out", async () => {
    const harness = await startDuel();
    const { run, scheduler } = harness;

    await scheduler.runFor(1_000);
    await run(new SubmitWord("chat-1", "alice", "cat", harness.now()));
    await scheduler.runFor(1_000);
    const wrap = await run(new SubmitWord("chat-1", "bob", "cow", harness.now()));

    expect(wrap?.next).toEqual({
      sequence: 3,
      playerId: "alice",
      displayName: "Alice",
      letter: "c",
      length: 3,
      round: 2,
      deadline: 52_000,
      durationMs: 50_000,
    });

    await scheduler.runFor(1_000);
    await run(new SubmitWord("chat-1", "alice", "cup", harness.now()));
    await scheduler.runFor(50_000);

    expect(harness.bus.types()).toEqual([
      "LobbyOpened",
      "PlayerJoined",
      "GameStarted",
      "TurnStarted",
      "TurnResolved",
      "TurnStarted",
      "TurnResolved",
      "TurnStarted",
      "TurnResolved",
      "TurnStarted",
      "TurnResolved",
      "PlayerEliminated",
      "GameOver",
    ]);
    expect(harness.bus.ofType("GameOver")).toEqual([
      {
        type: "GameOver",
        at: 53_000,
        summary: {
          chatId: "chat-1",
          mode: "multiplayer",
          reason: "winner",
          winner: "alice",
          rounds: 3,
          difficulty: "easy",
          ranking: [
            { playerId: "alice", displayName: "Alice", score: 6 },
            { playerId: "bob", displayName: "Bob", score: 3 },
          ],
        },
      },
    ]);

    expect(await harness.sessionGateway.findSession("chat-1")).toBeUndefined();
    expect(scheduler.pending).toEqual([]);

    const alice = await harness.playerGateway.loadPlayer("alice");
    expect(alice.balance).toBe(6);
    expect(alice.stats).toMatchObject({
      totalScore: 6,
      totalWords: 2,
      bestStreak: 2,
      longestWord: "cat",
      gamesCompleted: 1,
      gamesWon: 1,
    });
    const bob = await harness.playerGateway.loadPlayer("bob");
    expect(bob.stats).toMatchObject({ totalScore: 3, gamesCompleted: 1, gamesWon: 0 });

    expect(await getLeaderboard(harness.ctx, "wins")).toEqual([
      { rank: 1, playerId: "alice", displayName: "Alice", title: undefined, value: 1 },
      { rank: 2, playerId: "bob", displayName: "Bob", title: undefined, value: 0 },
    ]);
  });

  it("rejects a repeated word and keeps the turn open", async () => {
    const harness = await startDuel();
    await harness.run(new SubmitWord("chat-1", "alice", "cat", 0));

    const report = await harness.run(new SubmitWord("chat-1", "bob", "CAT", 0));

    expect(report?.outcome).toEqual({ type: "RejectedInvalid", reason: "AlreadyUsed" });
    const status = await getSessionStatus(harness.ctx, "chat-1", 10_000);
    expect(status.wordsPlayed).toBe(1);
    expect(status.turn).toMatchObject({ sequence: 2, playerId: "bob", remainingMs: 45_000 });
  });

  it("keeps a single clock armed for the live turn and ignores stale timeouts", async () => {
    const harness = await startDuel();
    await harness.scheduler.runFor(1_000);
    await harness.run(new SubmitWord("chat-1", "alice", "cat", harness.now()));

    expect(harness.scheduler.pending.map((timeout) => [timeout.sequence, timeout.at])).toEqual([
      [2, 56_000],
    ]);
    expect(await harness.run(new TurnTimeout("chat-1", 1, 55_000))).toBeNull();
    expect((await getSessionStatus(harness.ctx, "chat-1", 1_000)).players).toHaveLength(2);
  });

  it("resolves a turn exactly once when events race", async () => {
    const harness = await startDuel();

    const results = await Promise.all([
      harness.run(new SubmitWord("chat-1", "alice", "cat", 0)),
      harness.run(new Forfeit("chat-1", "alice", 0)),
    ]);

    expect(results.filter((report) => report !== null)).toHaveLength(1);
    expect(harness.bus.ofType("TurnResolved")).toHaveLength(1);
    expect(harness.scheduler.pending.map((timeout) => timeout.sequence)).toEqual([2]);
  });
});

describe("boosts", () => {
  it("buys and spends a skip", async () => {
    const harness = await startDuel({ startingBalance: 200 });

    await expect(
      harness.run(new UseBoost("chat-1", "alice", "skip", 0)),
    ).rejects.toMatchObject({ code: "NotOwned" });

    expect(await harness.run(new BuyBoost("alice", "Skip", 0))).toEqual({
      playerId: "alice",
      boost: "skip",
      cost: 150,
      balance: 50,
      owned: 1,
    });
    await expect(harness.run(new BuyBoost("alice", "skip", 0))).rejects.toMatchObject({
      code: "InsufficientPoints",
    });

    const report = await harness.run(new UseBoost("chat-1", "alice", "skip", 0));

    expect(report?.outcome).toEqual({ type: "Skipped" });
    expect(report?.next?.playerId).toBe("bob");
    expect((await harness.sessionGateway.loadSession("chat-1")).skipsUsed).toEqual({
      alice: 1,
      bob: 0,
    });
    expect(await getInventory(harness.ctx, "alice", 60_000)).toEqual({
      playerId: "alice",
      balance: 50,
      items: [
        { boost: "hint", owned: 0, cooldownRemainingMs: 0 },
        { boost: "skip", owned: 0, cooldownRemainingMs: 120_000 },
        { boost: "rebound", owned: 0, cooldownRemainingMs: 0 },
      ],
    });
  });

  it("caps skips per session", async () => {
    const harness = await startDuel({
      startingBalance: 1_000,
      boosts: {
        hint: { cost: 80, cooldownMs: 120_000, sessionCap: undefined },
        skip: { cost: 150, cooldownMs: 0, sessionCap: 3 },
        rebound: { cost: 250, cooldownMs: 0, sessionCap: undefined },
      },
    });

    for (let i = 0; i < 4; i++) {
      await harness.run(new BuyBoost("alice", "skip", 0));
    }
    for (let i = 0; i < 3; i++) {
      await harness.run(new UseBoost("chat-1", "alice", "skip", 0));
      await harness.run(new Forfeit("chat-1", "bob", 0));
    }

    await expect(
      harness.run(new UseBoost("chat-1", "alice", "skip", 0)),
    ).rejects.toMatchObject({ code: "SessionCapExceeded" });

    const alice = await harness.playerGateway.loadPlayer("alice");
    expect(alice.inventory.skip).toBe(1);
    expect(alice.balance).toBe(400);
    expect(alice.stats.skipsUsed).toBe(3);
  });

  it("suggests unused words and enforces the hint cooldown", async () => {
    const harness = await startDuel({ startingBalance: 200 });

    await expect(harness.run(new RequestHint("chat-1", "alice", 0))).rejects.toMatchObject({
      code: "NotOwned",
    });

    await harness.run(new BuyBoost("bob", "hint", 0));
    await harness.run(new BuyBoost("bob", "hint", 0));
    await harness.run(new SubmitWord("chat-1", "alice", "cat", 0));
    await harness.scheduler.runFor(10_000);

    expect(await harness.run(new RequestHint("chat-1", "bob", harness.now()))).toEqual({
      chatId: "chat-1",
      playerId: "bob",
      sequence: 2,
      letter: "c",
      length: 3,
      words: ["cab", "cod", "cow"],
      remaining: 1,
    });

    await harness.scheduler.runFor(1_000);
    await expect(
      harness.run(new RequestHint("chat-1", "bob", harness.now())),
    ).rejects.toMatchObject({ code: "OnCooldown", retryAfterMs: 119_000 });

    const bob = await harness.playerGateway.loadPlayer("bob");
    expect(bob.inventory.hint).toBe(1);
    expect(bob.stats.hintsUsed).toBe(1);
    expect((await getSessionStatus(harness.ctx, "chat-1", harness.now())).turn?.sequence).toBe(2);
  });
});

describe("hints on a closed turn", () => {
  it("spends nothing once the turn is claimed or its clock has run out", async () => {
    const harness = await startDuel({ startingBalance: 200 });
    await harness.run(new BuyBoost("alice", "hint", 0));

    expect(await harness.run(new RequestHint("chat-1", "alice", 55_000))).toBeNull();

    expect(await harness.sessionGateway.claimTurn("chat-1", 1)).toBe(true);
    expect(await harness.run(new RequestHint("chat-1", "alice", 1_000))).toBeNull();

    const alice = await harness.playerGateway.loadPlayer("alice");
    expect(alice.inventory.hint).toBe(1);
    expect(alice.stats.hintsUsed).toBe(0);
  });
});

/** Runs a /stop from bob right after the next turn claim succeeds. */
function stopAfterClaim(harness: Harness): void {
  const { sessionGateway } = harness;
  const claimTurn = sessionGateway.claimTurn.bind(sessionGateway);
  vi.spyOn(sessionGateway, "claimTurn").mockImplementation(async (chatId, sequence) => {
    const won = await claimTurn(chatId, sequence);
    await harness.run(new StopSession(chatId, "bob", harness.now()));
    return won;
  });
}

describe("stop racing a turn resolution", () => {
  it("does not end the game a second time when the last opponent times out", async () => {
    const harness = await startDuel();
    stopAfterClaim(harness);

    await expect(harness.run(new TurnTimeout("chat-1", 1, 55_000))).rejects.toMatchObject({
      code: "NoActiveSession",
    });

    expect(harness.bus.types()).toEqual([
      "LobbyOpened",
      "PlayerJoined",
      "GameStarted",
      "TurnStarted",
      "SessionStopped",
    ]);
    expect((await harness.playerGateway.loadPlayer("bob")).stats).toMatchObject({
      gamesCompleted: 0,
      gamesWon: 0,
    });
    expect(await harness.sessionGateway.findSession("chat-1")).toBeUndefined();
  });

  it("does not credit a word accepted after the session was stopped", async () => {
    const harness = await startDuel();
    stopAfterClaim(harness);

    await expect(harness.run(new SubmitWord("chat-1", "alice", "cat", 0))).rejects.toMatchObject({
      code: "NoActiveSession",
    });

    const alice = await harness.playerGateway.loadPlayer("alice");
    expect(alice.stats).toMatchObject({ totalScore: 0, totalWords: 0 });
    expect(alice.balance).toBe(harness.config.startingBalance);
    expect(harness.bus.ofType("TurnResolved")).toEqual([]);
    expect(harness.scheduler.pending).toEqual([]);
  });
});

describe("practice", () => {
  it("runs a solo game without touching cumulative stats", async () => {
    const harness = createHarness();
    const start = await harness.run(new BeginPractice("chat-9", "carol", "Carol", "easy", 0));
    expect(start.mode).toBe("practice");
    expect(start.turn).toMatchObject({ sequence: 1, playerId: "carol", letter: "c", length: 3 });

    await harness.scheduler.runFor(1_000);
    const report = await harness.run(new SubmitWord("chat-9", "carol", "cat", harness.now()));
    expect(report?.next).toMatchObject({ sequence: 2, round: 2, deadline: 51_000 });

    await expect(harness.run(new RequestHint("chat-9", "carol", 1_000))).rejects.toMatchObject({
      code: "BoostsDisabledInPractice",
    });
    await expect(
      harness.run(new UseBoost("chat-9", "carol", "skip", 1_000)),
    ).rejects.toMatchObject({ code: "BoostsDisabledInPractice" });

    await harness.scheduler.runFor(50_000);

    expect(harness.bus.ofType("GameOver")).toEqual([
      {
        type: "GameOver",
        at: 51_000,
        summary: {
          chatId: "chat-9",
          mode: "practice",
          reason: "practiceOver",
          winner: undefined,
          rounds: 2,
          difficulty: "easy",
          ranking: [{ playerId: "carol", displayName: "Carol", score: 3 }],
        },
      },
    ]);

    const carol = await harness.playerGateway.loadPlayer("carol");
    expect(carol.balance).toBe(0);
    expect(carol.stats).toMatchObject({ totalScore: 0, totalWords: 0, gamesCompleted: 0 });
    expect(await getLeaderboard(harness.ctx, "score")).toEqual([
      { rank: 1, playerId: "carol", displayName: "Carol", title: undefined, value: 0 },
    ]);
  });
});

describe("titles", () => {
  it("unlocks, equips and grants titles", async () => {
    const harness = await startDuel({
      achievementThresholds: { LEGEND: 1_000, WARRIOR: 10, SAGE: 1, PHOENIX: 10, SHADOW: 12 },
    });

    const report = await harness.run(new SubmitWord("chat-1", "alice", "cat", 0));

    expect(report?.unlocked).toEqual(["SAGE"]);
    expect(harness.bus.ofType("AchievementUnlocked")).toEqual([
      { type: "AchievementUnlocked", chatId: "chat-1", playerId: "alice", title: "SAGE", at: 0 },
    ]);

    await expect(harness.run(new EquipTitle("alice", "legend", 0))).rejects.toMatchObject({
      kind: "AchievementError",
      code: "NotUnlocked",
    });
    expect(await harness.run(new EquipTitle("alice", "sage", 0))).toEqual({
      playerId: "alice",
      titles: ["SAGE"],
      equippedTitle: "SAGE",
    });

    expect((await harness.run(new GrantTitle("bob", "kami", 0))).granted).toBe(true);
    expect((await harness.run(new GrantTitle("bob", "KAMI", 0))).granted).toBe(false);
    expect(await harness.run(new EquipTitle("bob", "KAMI", 0))).toMatchObject({
      equippedTitle: "KAMI",
    });
  });
});
