/* eslint-disable functional/immutable-data */
import { SessionStateError } from "../../domain/errors/index.js";
import { assertValidSession } from "../../domain/entities/SessionRules.js";
import type { SessionGateway, SessionState } from "../../domain/ports/SessionGateway.js";
import type { ChatId, Difficulty, PlayerId, TimePoint } from "../../domain/typedefs.js";

export class InMemorySessionGateway implements SessionGateway {
  #sessions = new Map<ChatId, SessionState>();

  async loadSession(chatId: ChatId): Promise<SessionState> {
    const state = this.#sessions.get(chatId);
    if (!state) throw new SessionStateError("NoActiveSession");
    return this.#clone(state);
  }

  async findSession(chatId: ChatId): Promise<SessionState | undefined> {
    const state = this.#sessions.get(chatId);
    return state ? this.#clone(state) : undefined;
  }

  async createSession(
    chatId: ChatId,
    host: PlayerId,
    displayName: string,
    phase: "lobby" | "practice",
    difficulty: Difficulty,
    createdAt: TimePoint,
  ): Promise<SessionState> {
    if (this.#sessions.has(chatId)) {
      throw new SessionStateError("AlreadyOpen");
    }

    const seedBuffer = new Uint32Array(1);
    globalThis.crypto.getRandomValues(seedBuffer);

    const state: SessionState = {
      chatId,
      host,
      phase,
      players: [host],
      participants: [],
      eliminated: [],
      displayNames: { [host]: displayName },
      currentTurnIndex: 0,
      difficulty,
      round: 0,
      usedWords: [],
      turnSequence: 0,
      scores: {},
      streaks: {},
      skipsUsed: {},
      reboundsUsed: {},
      seed: seedBuffer[0] ?? 0,
      createdAt,
    };

    this.#sessions.set(chatId, state);
    return this.#clone(state);
  }

  async updateLobby<TResult>(
    chatId: ChatId,
    mutate: (state: SessionState) => TResult,
  ): Promise<{ readonly state: SessionState; readonly result: TResult }> {
    const stored = this.#sessions.get(chatId);
    if (!stored || stored.phase !== "lobby") throw new SessionStateError("NotInLobby");

    const draft = this.#clone(stored);
    const result = mutate(draft);
    assertValidSession(draft);
    this.#sessions.set(chatId, draft);
    return { state: this.#clone(draft), result };
  }

  async saveSession(state: SessionState): Promise<void> {
    const stored = this.#sessions.get(state.chatId);
    if (!stored) throw new SessionStateError("NoActiveSession");

    const usedWords = [...stored.usedWords];
    for (const word of state.usedWords) {
      if (!usedWords.includes(word)) usedWords.push(word);
    }

    const next = this.#clone({ ...state, usedWords });
    assertValidSession(next);
    this.#sessions.set(state.chatId, next);
  }

  async claimTurn(chatId: ChatId, sequence: number): Promise<boolean> {
    const turn = this.#sessions.get(chatId)?.turn;
    if (!turn || turn.sequence !== sequence || turn.phase !== "awaiting") {
      return false;
    }
    turn.phase = "resolving";
    return true;
  }

  async deleteSession(chatId: ChatId): Promise<boolean> {
    return this.#sessions.delete(chatId);
  }

  #clone(state: SessionState): SessionState {
    return structuredClone(state);
  }
}
