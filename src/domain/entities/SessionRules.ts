import type { GameConfig } from "../GameConfig.js";
import type { LobbySnapshot, RankingEntry, RosterEntry } from "../outcomes.js";
import type { Dictionary } from "../ports/Dictionary.js";
import type { Constraint, SessionState } from "../ports/SessionGateway.js";
import type { PlayerId } from "../typedefs.js";
import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import { requiredLength } from "./Progression.js";

const ALPHABET = "abcdefghijklmnopqrstuvwxyz".split("");

export function mulberry32(seed: number) {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Letters a turn may start with, most specific first: letters that still have an unused word of
 * the length, then letters with any word of the length, then the whole alphabet.
 */
export function eligibleLetters(
  dictionary: Dictionary,
  length: number,
  usedWords: readonly string[],
): readonly string[] {
  const withWords = dictionary.lettersFor(length);
  if (withWords.length === 0) return ALPHABET;

  const used = new Set(usedWords);
  const withUnused = withWords.filter((letter) =>
    dictionary.candidates(letter, length).some((word) => !used.has(word)),
  );

  return withUnused.length > 0 ? withUnused : withWords;
}

export function drawConstraint(
  state: SessionState,
  sequence: number,
  dictionary: Dictionary,
  config: GameConfig,
): Constraint {
  const length = requiredLength(state.difficulty, state.round, config);
  const letters = eligibleLetters(dictionary, length, state.usedWords);
  const rng = mulberry32(state.seed + sequence);
  const letter = letters[Math.floor(rng() * letters.length)] ?? "a";
  return { letter, length };
}

export function currentPlayer(state: SessionState): PlayerId | undefined {
  return state.players[state.currentTurnIndex];
}

export interface PointerAdvance {
  readonly wrapped: boolean;
  readonly eliminated?: PlayerId;
}

/**
 * Moves the turn pointer to the next surviving player, optionally removing the current one first.
 * The round counter increments whenever the pointer wraps back to the start of the roster.
 */
export function advanceTurnPointer(state: SessionState, eliminate: boolean): PointerAdvance {
  const index = state.currentTurnIndex;

  if (eliminate) {
    const [removed] = state.players.splice(index, 1);
    if (removed !== undefined) {
      state.eliminated.push(removed);
    }

    if (state.players.length === 0) {
      state.currentTurnIndex = 0;
      return { wrapped: false, eliminated: removed };
    }

    const wrapped = index >= state.players.length;
    state.currentTurnIndex = wrapped ? 0 : index;
    if (wrapped) state.round += 1;
    return { wrapped, eliminated: removed };
  }

  const next = (index + 1) % state.players.length;
  state.currentTurnIndex = next;
  const wrapped = next === 0;
  if (wrapped) state.round += 1;
  return { wrapped };
}

/** Ranks the given players by in-session score, descending; ties by player id. */
export function rankPlayers(
  state: SessionState,
  players: readonly PlayerId[] = state.players,
): RankingEntry[] {
  return players
    .map((playerId) => ({
      playerId,
      displayName: state.displayNames[playerId] ?? playerId,
      score: state.scores[playerId] ?? 0,
    }))
    .sort((a, b) =>
      b.score !== a.score ? b.score - a.score : a.playerId.localeCompare(b.playerId),
    );
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check of the session invariants
// -----------------------------------------------------------------------------
export function assertValidSession(state: SessionState): void {
  const fail = (reason: string): never => {
    throw new InvalidSessionStateError(reason, state);
  };

  if (!Array.isArray(state.players)) fail("invalid players");
  if (new Set(state.players).size !== state.players.length) fail("duplicate player IDs");
  if (new Set(state.usedWords).size !== state.usedWords.length) fail("duplicate used words");

  switch (state.phase) {
    case "lobby": {
      if (state.players.length === 0) fail("empty lobby");
      if (state.turn !== undefined) fail("turn present in lobby");
      if (state.constraint !== undefined) fail("constraint present in lobby");
      break;
    }

    case "active":
    case "practice": {
      if (state.players.length === 0) fail("no surviving players");
      if (state.phase === "practice" && state.participants.length !== 1)
        fail("practice session must have exactly one participant");
      if (state.round < 1) fail("round must be at least 1");

      const turn = state.turn ?? fail("missing turn");
      if (state.constraint === undefined) fail("missing constraint");
      if (turn.sequence !== state.turnSequence) fail("turn sequence mismatch");
      if (turn.playerId !== currentPlayer(state)) fail("turn player is not the current player");

      for (const playerId of state.players) {
        if (!state.participants.includes(playerId))
          fail(`survivor ${playerId} is not a participant`);
      }
      break;
    }

    case "stopped": {
      if (state.turn !== undefined) fail("turn present in stopped session");
      break;
    }

    default:
      fail(`invalid phase: ${String(state.phase)}`);
  }
}

export function describeRoster(state: SessionState): RosterEntry[] {
  return state.players.map((playerId) => ({
    playerId,
    displayName: state.displayNames[playerId] ?? playerId,
  }));
}

export function describeLobby(state: SessionState): LobbySnapshot {
  return {
    chatId: state.chatId,
    host: state.host,
    difficulty: state.difficulty,
    players: describeRoster(state),
  };
}
