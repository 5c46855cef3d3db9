import { describe, expect, it } from "vitest";

import { SubmitWord } from "../src/domain/commands/SubmitWord.js";
import { GameCommandInputError } from "../src/domain/errors/GameCommandInputError.js";
import { createCommandContext, makeActiveSession } from "./support/mocks.js";

describe("SubmitWord command", () => {
  it("rejects an invalid word without claiming the turn", async () => {
    const context = createCommandContext();
    const { sessionGateway, scheduler, bus } = context;
    sessionGateway.loadSession.mockResolvedValue(makeActiveSession());

    const report = await new SubmitWord("chat-1", "alice", "dog", 1_000).execute(context);

    expect(report).toEqual({
      chatId: "chat-1",
      playerId: "alice",
      sequence: 1,
      outcome: { type: "RejectedInvalid", reason: "WrongLetter" },
    });
    expect(sessionGateway.claimTurn).not.toHaveBeenCalled();
    expect(sessionGateway.saveSession).not.toHaveBeenCalled();
    expect(scheduler.cancelTurnTimeout).not.toHaveBeenCalled();
    expect(bus.publish).not.toHaveBeenCalled();
  });

  it("accepts a valid word, records it and starts the next player's turn", async () => {
    const context = createCommandContext();
    const { sessionGateway, playerGateway, scheduler, bus } = context;
    playerGateway.seed("alice");
    playerGateway.seed("bob");
    sessionGateway.loadSession.mockResolvedValue(makeActiveSession());
    sessionGateway.claimTurn.mockResolvedValue(true);

    const report = await new SubmitWord("chat-1", "alice", " Cat ", 1_000).execute(context);

    expect(report).toEqual({
      chatId: "chat-1",
      playerId: "alice",
      sequence: 1,
      outcome: { type: "Accepted", word: "cat", points: 3, streak: 1, combo: false },
      next: {
        sequence: 2,
        playerId: "bob",
        displayName: "Bob",
        letter: "c",
        length: 3,
        round: 1,
        deadline: 56_000,
        durationMs: 55_000,
      },
    });

    expect(sessionGateway.claimTurn).toHaveBeenCalledWith("chat-1", 1);
    expect(scheduler.cancelTurnTimeout).toHaveBeenCalledWith("chat-1");
    expect(scheduler.scheduleTurnTimeout).toHaveBeenCalledWith("chat-1", 2, 55_000);
    expect(sessionGateway.saveSession).toHaveBeenCalledWith(
      expect.objectContaining({
        usedWords: ["cat"],
        turnSequence: 2,
        currentTurnIndex: 1,
        scores: { alice: 3, bob: 0 },
        streaks: { alice: 1, bob: 0 },
      }),
    );
    expect(bus.publish).toHaveBeenCalledWith("chat:chat-1", {
      type: "TurnResolved",
      chatId: "chat-1",
      sequence: 1,
      playerId: "alice",
      outcome: { type: "Accepted", word: "cat", points: 3, streak: 1, combo: false },
      at: 1_000,
    });

    const alice = playerGateway.players.get("alice");
    expect(alice?.stats.totalScore).toBe(3);
    expect(alice?.stats.totalWords).toBe(1);
    expect(alice?.balance).toBe(3);
  });

  it("resolves to null when a competing event already claimed the turn", async () => {
    const context = createCommandContext();
    const { sessionGateway, playerGateway, bus } = context;
    playerGateway.seed("alice");
    sessionGateway.loadSession.mockResolvedValue(makeActiveSession());
    sessionGateway.claimTurn.mockResolvedValue(false);

    const report = await new SubmitWord("chat-1", "alice", "cat", 1_000).execute(context);

    expect(report).toBeNull();
    expect(playerGateway.updates).toEqual([]);
    expect(bus.publish).not.toHaveBeenCalled();
  });

  it("discards submissions arriving at or after the deadline", async () => {
    const context = createCommandContext();
    const { sessionGateway } = context;
    sessionGateway.loadSession.mockResolvedValue(makeActiveSession());

    const report = await new SubmitWord("chat-1", "alice", "cat", 55_000).execute(context);

    expect(report).toBeNull();
    expect(sessionGateway.claimTurn).not.toHaveBeenCalled();
  });

  it("fails with NotYourTurn for anyone but the current player", async () => {
    const context = createCommandContext();
    context.sessionGateway.loadSession.mockResolvedValue(makeActiveSession());

    await expect(
      new SubmitWord("chat-1", "bob", "cat", 1_000).execute(context),
    ).rejects.toMatchObject({ kind: "StateError", code: "NotYourTurn" });
  });

  it("fails with NoActiveSession while the chat is still in the lobby", async () => {
    const context = createCommandContext();
    context.sessionGateway.loadSession.mockResolvedValue(
      makeActiveSession({ phase: "lobby", turn: undefined, constraint: undefined }),
    );

    await expect(
      new SubmitWord("chat-1", "alice", "cat", 1_000).execute(context),
    ).rejects.toMatchObject({ code: "NoActiveSession" });
  });

  it("validates identifiers on construction", () => {
    expect(() => new SubmitWord("chat 1", "", "cat", 0)).toThrow(GameCommandInputError);
  });
});
