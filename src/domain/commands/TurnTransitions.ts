import { chatChannel } from "../channels.js";
import { evaluateAchievements } from "../entities/Achievements.js";
import { turnDurationMs } from "../entities/Progression.js";
import { recordAcceptedWord } from "../entities/Scoring.js";
import {
  advanceTurnPointer,
  assertValidSession,
  currentPlayer,
  drawConstraint,
} from "../entities/SessionRules.js";
import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import type { TurnInfo, TurnOutcome, TurnReport } from "../outcomes.js";
import type { SessionState, TurnState } from "../ports/SessionGateway.js";
import type { PlayerId, TimePoint, TitleId } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import { finishSession } from "./FinalizeSession.js";

export type ResolvedOutcome = Exclude<TurnOutcome, { readonly type: "RejectedInvalid" }>;

export interface TurnResolution {
  readonly playerId: PlayerId;
  readonly sequence: number;
  readonly outcome: ResolvedOutcome;
  /** Remove the player from the rotation (timeouts only) */
  readonly eliminate: boolean;
}

export function describeTurn(state: SessionState, turn: TurnState): TurnInfo {
  const constraint = state.constraint;
  if (!constraint) {
    throw new InvalidSessionStateError("missing constraint", state);
  }
  return {
    sequence: turn.sequence,
    playerId: turn.playerId,
    displayName: state.displayNames[turn.playerId] ?? turn.playerId,
    letter: constraint.letter,
    length: constraint.length,
    round: state.round,
    deadline: turn.deadline,
    durationMs: turn.deadline - turn.startedAt,
  };
}

/**
 * Returns the live turn when `playerId` holds it; throws when the session is not being played or
 * another player is on turn.
 */
export function requireTurnOf(state: SessionState, playerId: PlayerId): TurnState {
  if (state.phase !== "active" && state.phase !== "practice") {
    throw new SessionStateError("NoActiveSession", "No game is running in this chat");
  }
  const turn = state.turn;
  if (!turn) {
    throw new InvalidSessionStateError("missing turn", state);
  }
  if (turn.playerId !== playerId) {
    throw new SessionStateError("NotYourTurn");
  }
  return turn;
}

/**
 * Issues the next turn on the snapshot without persisting it: bumps the sequence, draws the
 * constraint and sets the deadline.
 */
export function issueTurn(
  state: SessionState,
  at: TimePoint,
  { dictionary, config }: CommandContext,
): TurnState {
  const playerId = currentPlayer(state);
  if (playerId === undefined) {
    throw new InvalidSessionStateError("no current player", state);
  }

  const sequence = state.turnSequence + 1;
  const durationMs = turnDurationMs(state.round, config);

  state.turnSequence = sequence;
  state.constraint = drawConstraint(state, sequence, dictionary, config);
  state.turn = {
    sequence,
    playerId,
    phase: "awaiting",
    startedAt: at,
    deadline: at + durationMs,
  };

  assertValidSession(state);
  return state.turn;
}

/** Arms the clock for a turn that is already persisted and announces it. */
export async function armTurn(
  state: SessionState,
  at: TimePoint,
  { scheduler, bus, logger }: CommandContext,
): Promise<TurnInfo> {
  const turn = state.turn;
  if (!turn) {
    throw new InvalidSessionStateError("missing turn", state);
  }

  const info = describeTurn(state, turn);
  await scheduler.scheduleTurnTimeout(state.chatId, turn.sequence, info.durationMs);

  logger?.info?.("Turn started", {
    chatId: state.chatId,
    sequence: turn.sequence,
    playerId: turn.playerId,
    letter: info.letter,
    length: info.length,
    round: state.round,
  });

  await bus.publish(chatChannel(state.chatId), {
    type: "TurnStarted",
    chatId: state.chatId,
    at,
    turn: info,
  });

  return info;
}

/**
 * Applies the cumulative side effects of an accepted multiplayer word and returns any titles it
 * unlocked. Practice sessions never reach this.
 */
async function recordAcceptedForPlayer(
  state: SessionState,
  playerId: PlayerId,
  word: string,
  streak: number,
  at: TimePoint,
  { playerGateway, bus, config }: CommandContext,
): Promise<TitleId[]> {
  const { result: unlocked } = await playerGateway.updatePlayer(playerId, (player) => {
    recordAcceptedWord(player, word, streak);
    return evaluateAchievements(player, config);
  });

  for (const title of unlocked) {
    await bus.publish(chatChannel(state.chatId), {
      type: "AchievementUnlocked",
      chatId: state.chatId,
      playerId,
      title,
      at,
    });
  }

  return unlocked;
}

/**
 * Finishes a claimed turn: stops its clock, moves the pointer (eliminating on timeout) and either
 * starts the next turn or ends the game.
 *
 * The session write (next turn saved, or finished session deleted) happens before stats or events.
 * When a stop removed the session after the claim, this fails with `NoActiveSession` and leaves
 * nothing behind.
 */
export async function completeTurn(
  state: SessionState,
  resolution: TurnResolution,
  at: TimePoint,
  ctx: CommandContext,
): Promise<TurnReport> {
  const { sessionGateway, scheduler, bus, logger } = ctx;
  const { playerId, sequence, outcome } = resolution;
  const multiplayer = state.phase === "active";

  await scheduler.cancelTurnTimeout(state.chatId);

  if (outcome.type === "Accepted" && !state.usedWords.includes(outcome.word)) {
    state.usedWords.push(outcome.word);
  }

  const { eliminated } = advanceTurnPointer(state, resolution.eliminate);
  const gameOver = multiplayer ? state.players.length <= 1 : state.players.length === 0;

  if (gameOver) {
    const deleted = await sessionGateway.deleteSession(state.chatId);
    if (!deleted) {
      throw new SessionStateError("NoActiveSession");
    }
  } else {
    issueTurn(state, at, ctx);
    await sessionGateway.saveSession(state);
  }

  const unlocked =
    outcome.type === "Accepted" && multiplayer
      ? await recordAcceptedForPlayer(state, playerId, outcome.word, outcome.streak, at, ctx)
      : [];

  logger?.info?.("Turn resolved", {
    chatId: state.chatId,
    sequence,
    playerId,
    outcome: outcome.type,
    eliminated,
  });

  await bus.publish(chatChannel(state.chatId), {
    type: "TurnResolved",
    chatId: state.chatId,
    sequence,
    playerId,
    outcome,
    at,
  });

  if (eliminated !== undefined) {
    await bus.publish(chatChannel(state.chatId), {
      type: "PlayerEliminated",
      chatId: state.chatId,
      playerId: eliminated,
      score: state.scores[eliminated] ?? 0,
      survivors: [...state.players],
      at,
    });
  }

  const base: TurnReport = {
    chatId: state.chatId,
    playerId,
    sequence,
    outcome,
    ...(eliminated !== undefined ? { eliminated } : {}),
    ...(unlocked.length > 0 ? { unlocked } : {}),
  };

  if (gameOver) {
    const summary = await finishSession(state, at, ctx);
    return { ...base, gameOver: summary };
  }

  const next = await armTurn(state, at, ctx);
  return { ...base, next };
}
