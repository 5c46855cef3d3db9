import { resetStreak } from "../entities/Scoring.js";
import type { TurnReport } from "../outcomes.js";
import type { ChatId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { completeTurn } from "./TurnTransitions.js";

/**
 * Fired by the scheduler when a turn's clock runs out. The player on turn is eliminated but keeps
 * the points already earned. Stale timeouts (session gone, sequence superseded, turn already
 * claimed) resolve to `null`.
 */
export class TurnTimeout extends Command<TurnReport | null> {
  readonly type = "TurnTimeout" as const;

  constructor(
    public readonly chatId: ChatId,
    public readonly sequence: number,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<TurnReport | null> {
    const { sessionGateway, logger } = ctx;
    const state = await sessionGateway.findSession(this.chatId);
    const turn = state?.turn;

    if (!state || !turn || turn.sequence !== this.sequence || turn.phase !== "awaiting") {
      logger?.debug?.("Stale timeout discarded", {
        type: this.type,
        chatId: this.chatId,
        sequence: this.sequence,
        current: turn?.sequence,
      });
      return null;
    }

    const claimed = await sessionGateway.claimTurn(this.chatId, this.sequence);
    if (!claimed) {
      logger?.debug?.("Timeout discarded; turn already claimed", {
        type: this.type,
        chatId: this.chatId,
        sequence: this.sequence,
      });
      return null;
    }

    resetStreak(state, turn.playerId);

    logger?.info?.("Turn timed out", {
      type: this.type,
      chatId: this.chatId,
      playerId: turn.playerId,
      sequence: this.sequence,
      at: this.at,
    });

    return completeTurn(
      state,
      {
        playerId: turn.playerId,
        sequence: this.sequence,
        outcome: { type: "TimedOut" },
        eliminate: true,
      },
      this.at,
      ctx,
    );
  }
}
