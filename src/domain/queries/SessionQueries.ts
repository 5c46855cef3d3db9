import { describeRoster, rankPlayers } from "../entities/SessionRules.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import type { CommandContext } from "../commands/Command.js";
import { describeTurn } from "../commands/TurnTransitions.js";
import type { RankingEntry, RosterEntry, TurnInfo } from "../outcomes.js";
import type { ChatId, Difficulty, PlayerId, SessionPhase, TimePoint } from "../typedefs.js";

export interface SessionStatus {
  readonly chatId: ChatId;
  readonly phase: SessionPhase;
  readonly difficulty: Difficulty;
  readonly round: number;
  readonly players: readonly RosterEntry[];
  readonly eliminated: readonly PlayerId[];
  readonly standings: readonly RankingEntry[];
  readonly wordsPlayed: number;
  readonly turn?: TurnInfo & { readonly remainingMs: number };
}

/** Whose turn it is, the live constraint and the time left on the clock. */
export async function getSessionStatus(
  { sessionGateway }: Pick<CommandContext, "sessionGateway">,
  chatId: ChatId,
  at: TimePoint,
): Promise<SessionStatus> {
  const state = await sessionGateway.findSession(chatId);
  if (!state) {
    throw new SessionStateError("NoActiveSession");
  }

  const status: SessionStatus = {
    chatId,
    phase: state.phase,
    difficulty: state.difficulty,
    round: state.round,
    players: describeRoster(state),
    eliminated: [...state.eliminated],
    standings: rankPlayers(state, state.phase === "lobby" ? state.players : state.participants),
    wordsPlayed: state.usedWords.length,
  };

  if (!state.turn) {
    return status;
  }

  const turn = describeTurn(state, state.turn);
  return {
    ...status,
    turn: { ...turn, remainingMs: Math.max(0, turn.deadline - at) },
  };
}
