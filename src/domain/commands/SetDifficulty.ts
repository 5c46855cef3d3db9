import { chatChannel } from "../channels.js";
import { describeLobby } from "../entities/SessionRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { LobbySnapshot } from "../outcomes.js";
import {
  DIFFICULTIES,
  isDifficulty,
  type ChatId,
  type Difficulty,
  type PlayerId,
  type TimePoint,
} from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";

export class SetDifficulty extends Command<LobbySnapshot> {
  readonly type = "SetDifficulty" as const;
  readonly difficulty: Difficulty;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
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

  async execute({ sessionGateway, bus, logger }: CommandContext): Promise<LobbySnapshot> {
    const { state } = await sessionGateway.updateLobby(this.chatId, (lobby) => {
      lobby.difficulty = this.difficulty;
    });

    logger?.info?.("Difficulty changed", {
      type: this.type,
      chatId: this.chatId,
      difficulty: this.difficulty,
      at: this.at,
    });

    const lobby = describeLobby(state);

    await bus.publish(chatChannel(this.chatId), {
      type: "DifficultyChanged",
      at: this.at,
      difficulty: this.difficulty,
      lobby,
    });

    return lobby;
  }
}
