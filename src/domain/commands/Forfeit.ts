import { resetStreak } from "../entities/Scoring.js";
import type { TurnReport } from "../outcomes.js";
import type { ChatId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";
import { completeTurn, requireTurnOf } from "./TurnTransitions.js";

/** Free pass of the current turn. No boost, no cap, no elimination. */
export class Forfeit extends Command<TurnReport | null> {
  readonly type = "Forfeit" as const;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ chatId, playerId });
  }

  async execute(ctx: CommandContext): Promise<TurnReport | null> {
    const { sessionGateway, logger } = ctx;
    const state = await sessionGateway.loadSession(this.chatId);
    const turn = requireTurnOf(state, this.playerId);

    const claimed =
      turn.phase === "awaiting" &&
      (await sessionGateway.claimTurn(this.chatId, turn.sequence));
    if (!claimed) {
      logger?.debug?.("Forfeit discarded; turn already claimed", {
        type: this.type,
        chatId: this.chatId,
        sequence: turn.sequence,
      });
      return null;
    }

    resetStreak(state, this.playerId);

    return completeTurn(
      state,
      {
        playerId: this.playerId,
        sequence: turn.sequence,
        outcome: { type: "Forfeited" },
        eliminate: false,
      },
      this.at,
      ctx,
    );
  }
}
