import { scoreAcceptedWord } from "../entities/Scoring.js";
import { validateWord } from "../entities/WordValidator.js";
import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import type { TurnReport } from "../outcomes.js";
import type { ChatId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";
import { completeTurn, requireTurnOf } from "./TurnTransitions.js";

/**
 * A word typed by the player on turn. Resolves to `null` when the turn was already resolved by a
 * competing event (or the clock ran out); such submissions are dropped without a reply.
 */
export class SubmitWord extends Command<TurnReport | null> {
  readonly type = "SubmitWord" as const;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
    public readonly text: string,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ chatId, playerId });
  }

  async execute(ctx: CommandContext): Promise<TurnReport | null> {
    const { sessionGateway, dictionary, config, logger } = ctx;
    const state = await sessionGateway.loadSession(this.chatId);
    const turn = requireTurnOf(state, this.playerId);

    if (turn.phase !== "awaiting" || this.at >= turn.deadline) {
      logger?.debug?.("Submission discarded; turn no longer open", {
        type: this.type,
        chatId: this.chatId,
        sequence: turn.sequence,
        at: this.at,
      });
      return null;
    }

    const constraint = state.constraint;
    if (!constraint) {
      throw new InvalidSessionStateError("missing constraint", state);
    }

    const result = validateWord(constraint, state.usedWords, dictionary, this.text);

    if (!result.ok) {
      logger?.info?.("Submission rejected", {
        type: this.type,
        chatId: this.chatId,
        playerId: this.playerId,
        sequence: turn.sequence,
        reason: result.reason,
      });
      return {
        chatId: this.chatId,
        playerId: this.playerId,
        sequence: turn.sequence,
        outcome: { type: "RejectedInvalid", reason: result.reason },
      };
    }

    const claimed = await sessionGateway.claimTurn(this.chatId, turn.sequence);
    if (!claimed) {
      logger?.debug?.("Submission discarded; turn already claimed", {
        type: this.type,
        chatId: this.chatId,
        sequence: turn.sequence,
      });
      return null;
    }

    const { word } = result;
    const score = scoreAcceptedWord(state, this.playerId, word, config);

    return completeTurn(
      state,
      {
        playerId: this.playerId,
        sequence: turn.sequence,
        outcome: { type: "Accepted", word, ...score },
        eliminate: false,
      },
      this.at,
      ctx,
    );
  }
}
