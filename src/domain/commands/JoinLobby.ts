import { chatChannel } from "../channels.js";
import { describeLobby } from "../entities/SessionRules.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import type { LobbySnapshot } from "../outcomes.js";
import type { ChatId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds, displayNameOr } from "./commandInput.js";

export class JoinLobby extends Command<LobbySnapshot> {
  readonly type = "JoinLobby" as const;

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

    const { state } = await sessionGateway.updateLobby(this.chatId, (lobby) => {
      if (lobby.players.includes(this.playerId)) {
        throw new SessionStateError("AlreadyJoined");
      }
      lobby.players.push(this.playerId);
      lobby.displayNames[this.playerId] = name;
    });

    logger?.info?.("Player joined lobby", {
      type: this.type,
      chatId: this.chatId,
      playerId: this.playerId,
      at: this.at,
    });

    const lobby = describeLobby(state);

    await bus.publish(chatChannel(this.chatId), {
      type: "PlayerJoined",
      at: this.at,
      playerId: this.playerId,
      lobby,
    });

    return lobby;
  }
}
