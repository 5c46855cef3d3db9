import { chatChannel } from "../channels.js";
import { describeRoster } from "../entities/SessionRules.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import type { GameStart } from "../outcomes.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { ChatId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";
import { armTurn, issueTurn } from "./TurnTransitions.js";

/**
 * Fixes the roster as the turn order, resets the per-player counters and issues the first turn on
 * the snapshot. Shared by multiplayer and practice starts; nothing is persisted here.
 */
export function preparePlay(
  state: SessionState,
  mode: "active" | "practice",
  at: TimePoint,
  ctx: CommandContext,
): void {
  state.phase = mode;
  state.participants = [...state.players];
  state.eliminated = [];
  state.currentTurnIndex = 0;
  state.round = 1;

  for (const playerId of state.players) {
    state.scores[playerId] = 0;
    state.streaks[playerId] = 0;
    state.skipsUsed[playerId] = 0;
    state.reboundsUsed[playerId] = 0;
  }

  issueTurn(state, at, ctx);
}

/** Announces a prepared and persisted game, then arms its first turn. */
export async function announcePlay(
  state: SessionState,
  at: TimePoint,
  ctx: CommandContext,
): Promise<GameStart> {
  const players = describeRoster(state);
  const gameMode = state.phase === "practice" ? "practice" : "multiplayer";

  await ctx.bus.publish(chatChannel(state.chatId), {
    type: "GameStarted",
    chatId: state.chatId,
    mode: gameMode,
    difficulty: state.difficulty,
    players,
    at,
  });

  const turn = await armTurn(state, at, ctx);

  return {
    chatId: state.chatId,
    mode: gameMode,
    difficulty: state.difficulty,
    players,
    turn,
  };
}

export class BeginGame extends Command<GameStart> {
  readonly type = "BeginGame" as const;

  constructor(
    public readonly chatId: ChatId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ chatId, playerId });
  }

  async execute(ctx: CommandContext): Promise<GameStart> {
    const { sessionGateway, config, logger } = ctx;

    // lobby -> active in a single gateway step
    const { state } = await sessionGateway.updateLobby(this.chatId, (lobby) => {
      if (lobby.players.length < config.minPlayers) {
        throw new SessionStateError(
          "InsufficientPlayers",
          `At least ${config.minPlayers} players are needed to begin`,
        );
      }
      preparePlay(lobby, "active", this.at, ctx);
    });

    logger?.info?.("Game starting", {
      type: this.type,
      chatId: this.chatId,
      players: [...state.players],
      difficulty: state.difficulty,
      at: this.at,
    });

    return announcePlay(state, this.at, ctx);
  }
}
