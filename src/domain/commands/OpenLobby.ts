import { chatChannel } from "../channels.js";
import { describeLobby } from "../entities/SessionRules.js";
import type { LobbySnapshot } from "../outcomes.js";
import type { ChatId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds, displayNameOr } from "./commandInput.js";

export class OpenLobby extends Command<LobbySnapshot> {
  readonly type = "OpenLobby" as const;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
    public readonly displayName: string,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ chatId, playerId });
  }

  async execute(ctx: CommandContext): Promise<LobbySnapshot> {
    const { sessionGateway, playerGateway, bus, logger } = ctx;
    const name = displayNameOr(this.displayName, this.playerId);

    await playerGateway.ensurePlayer(this.playerId, name, this.at);

    const state = await sessionGateway.createSession(
      this.chatId,
      this.playerId,
      name,
      "lobby",
      "easy",
      this.at,
    );

    logger?.info?.("Lobby opened", {
      type: this.type,
      chatId: this.chatId,
      host: this.playerId,
      at: this.at,
    });

    const lobby = describeLobby(state);

    await bus.publish(chatChannel(this.chatId), {
      type: "LobbyOpened",
      at: this.at,
      lobby,
    });

    return lobby;
  }
}
