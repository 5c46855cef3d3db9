import { consumeBoost } from "../entities/BoostLedger.js";
import { recordBoostUse } from "../entities/Scoring.js";
import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import type { HintResult } from "../outcomes.js";
import type { ChatId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";
import { requireTurnOf } from "./TurnTransitions.js";

/**
 * Spends a hint for the current constraint. The turn and its clock are untouched.
 * Suggestions are deterministic: shortest first, then alphabetical. Resolves to `null`, spending
 * nothing, once the turn is claimed or its clock has run out.
 */
export class RequestHint extends Command<HintResult | null> {
  readonly type = "RequestHint" as const;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ chatId, playerId });
  }

  async execute({
    sessionGateway,
    playerGateway,
    dictionary,
    config,
    logger,
  }: CommandContext): Promise<HintResult | null> {
    const state = await sessionGateway.loadSession(this.chatId);

    if (state.phase === "practice") {
      throw new SessionStateError("BoostsDisabledInPractice");
    }

    const turn = requireTurnOf(state, this.playerId);
    if (turn.phase !== "awaiting" || this.at >= turn.deadline) {
      logger?.debug?.("Hint discarded; turn closed", {
        type: this.type,
        chatId: this.chatId,
        sequence: turn.sequence,
      });
      return null;
    }

    const constraint = state.constraint;
    if (!constraint) {
      throw new InvalidSessionStateError("missing constraint", state);
    }

    const { player } = await playerGateway.updatePlayer(this.playerId, (record) => {
      consumeBoost(record, "hint", this.at, 0, config);
      recordBoostUse(record, "hint");
    });

    const used = new Set(state.usedWords);
    const words = dictionary
      .candidates(constraint.letter, constraint.length)
      .filter((word) => !used.has(word))
      .sort((a, b) => a.length - b.length || (a < b ? -1 : a > b ? 1 : 0))
      .slice(0, config.hintCount);

    logger?.info?.("Hint used", {
      type: this.type,
      chatId: this.chatId,
      playerId: this.playerId,
      sequence: turn.sequence,
      suggestions: words.length,
    });

    return {
      chatId: this.chatId,
      playerId: this.playerId,
      sequence: turn.sequence,
      letter: constraint.letter,
      length: constraint.length,
      words,
      remaining: player.inventory.hint,
    };
  }
}
