import { chatChannel } from "../channels.js";
import { rankPlayers } from "../entities/SessionRules.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import type { GameSummary } from "../outcomes.js";
import type { ChatId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";

export class StopSession extends Command<GameSummary> {
  readonly type = "StopSession" as const;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ chatId, playerId });
  }

  async execute({ sessionGateway, scheduler, bus, logger }: CommandContext): Promise<GameSummary> {
    const state = await sessionGateway.loadSession(this.chatId);

    await scheduler.cancelTurnTimeout(this.chatId);

    const deleted = await sessionGateway.deleteSession(this.chatId);
    if (!deleted) {
      throw new SessionStateError("NoActiveSession");
    }

    const summary: GameSummary = {
      chatId: this.chatId,
      mode: state.phase === "practice" ? "practice" : "multiplayer",
      reason: "stopped",
      winner: undefined,
      rounds: state.round,
      difficulty: state.difficulty,
      ranking: rankPlayers(state),
    };

    logger?.info?.("Session stopped", {
      type: this.type,
      chatId: this.chatId,
      stoppedBy: this.playerId,
      phase: state.phase,
      at: this.at,
    });

    await bus.publish(chatChannel(this.chatId), {
      type: "SessionStopped",
      at: this.at,
      summary,
    });

    return summary;
  }
}
