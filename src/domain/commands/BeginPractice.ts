import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { GameStart } from "../outcomes.js";
import {
  DIFFICULTIES,
  isDifficulty,
  type ChatId,
  type Difficulty,
  type PlayerId,
  type TimePoint,
} from "../typedefs.js";
import { announcePlay, preparePlay } from "./BeginGame.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds, displayNameOr } from "./commandInput.js";

/**
 * Solo game. Runs the same turn engine but never touches cumulative stats, balance or boosts.
 */
export class BeginPractice extends Command<GameStart> {
  readonly type = "BeginPractice" as const;
  readonly difficulty: Difficulty;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
    public readonly displayName: string,
    difficulty: string,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ chatId, playerId });

    const level = difficulty.trim().toLowerCase();
    if (!isDifficulty(level)) {
      throw GameCommandInputError.because([
        `Difficulty must be one of: ${DIFFICULTIES.join(", ")}`,
      ]);
    }
    this.difficulty = level;
  }

  async execute(ctx: CommandContext): Promise<GameStart> {
    const { sessionGateway, playerGateway, logger } = ctx;
    const name = displayNameOr(this.displayName, this.playerId);

    await playerGateway.ensurePlayer(this.playerId, name, this.at);

    const state = await sessionGateway.createSession(
      this.chatId,
      this.playerId,
      name,
      "practice",
      this.difficulty,
      this.at,
    );

    logger?.info?.("Practice starting", {
      type: this.type,
      chatId: this.chatId,
      playerId: this.playerId,
      difficulty: this.difficulty,
      at: this.at,
    });

    preparePlay(state, "practice", this.at, ctx);
    await sessionGateway.saveSession(state);

    return announcePlay(state, this.at, ctx);
  }
}
