import { consumeBoost, refundBoost } from "../entities/BoostLedger.js";
import { recordBoostUse, resetStreak } from "../entities/Scoring.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import type { TurnReport } from "../outcomes.js";
import type { ChatId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";
import { completeTurn, requireTurnOf } from "./TurnTransitions.js";

export type TurnBoost = "skip" | "rebound";

/**
 * Spends a skip or rebound to pass the current turn without elimination.
 *
 * The boost is consumed before the turn is claimed; if a competing event wins the claim the boost
 * is refunded and the command resolves to `null`.
 */
export class UseBoost extends Command<TurnReport | null> {
  readonly type = "UseBoost" as const;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
    public readonly boost: TurnBoost,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ chatId, playerId });

    if (boost !== "skip" && boost !== "rebound") {
      throw GameCommandInputError.because(["Boost must be skip or rebound"]);
    }
  }

  async execute(ctx: CommandContext): Promise<TurnReport | null> {
    const { sessionGateway, playerGateway, config, logger } = ctx;
    const state = await sessionGateway.loadSession(this.chatId);

    if (state.phase === "practice") {
      throw new SessionStateError("BoostsDisabledInPractice");
    }

    const turn = requireTurnOf(state, this.playerId);
    if (turn.phase !== "awaiting") {
      logger?.debug?.("Boost discarded; turn already claimed", {
        type: this.type,
        chatId: this.chatId,
        sequence: turn.sequence,
      });
      return null;
    }

    const counters = this.boost === "skip" ? state.skipsUsed : state.reboundsUsed;
    const sessionUses = counters[this.playerId] ?? 0;

    const { result: receipt } = await playerGateway.updatePlayer(this.playerId, (player) =>
      consumeBoost(player, this.boost, this.at, sessionUses, config),
    );

    const claimed = await sessionGateway.claimTurn(this.chatId, turn.sequence);
    if (!claimed) {
      await playerGateway.updatePlayer(this.playerId, (player) => refundBoost(player, receipt));
      logger?.debug?.("Boost refunded; turn already claimed", {
        type: this.type,
        chatId: this.chatId,
        boost: this.boost,
        sequence: turn.sequence,
      });
      return null;
    }

    await playerGateway.updatePlayer(this.playerId, (player) =>
      recordBoostUse(player, this.boost),
    );

    counters[this.playerId] = sessionUses + 1;
    resetStreak(state, this.playerId);

    logger?.info?.("Boost used", {
      type: this.type,
      chatId: this.chatId,
      playerId: this.playerId,
      boost: this.boost,
      sessionUses: sessionUses + 1,
    });

    return completeTurn(
      state,
      {
        playerId: this.playerId,
        sequence: turn.sequence,
        outcome: { type: this.boost === "skip" ? "Skipped" : "Rebounded" },
        eliminate: false,
      },
      this.at,
      ctx,
    );
  }
}
