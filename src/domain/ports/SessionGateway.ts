/* eslint-disable functional/prefer-readonly-type */
import type {
  ChatId,
  Difficulty,
  PlayerId,
  SessionPhase,
  TimePoint,
  TurnPhase,
} from "../typedefs.js";

export interface Constraint {
  readonly letter: string;
  readonly length: number;
}

export interface TurnState {
  readonly sequence: number;
  readonly playerId: PlayerId;
  phase: TurnPhase;
  readonly startedAt: TimePoint;
  readonly deadline: TimePoint;
}

/**
 * The authoritative snapshot of one chat's game.
 * Turn fields are present only while the session is active or in practice.
 */
export interface SessionState {
  readonly chatId: ChatId;

  /** Player who opened the lobby (or started practice) */
  readonly host: PlayerId;

  phase: SessionPhase;

  /** Surviving roster in turn order */
  players: PlayerId[];

  /** Everyone who was in the roster when the game began */
  participants: PlayerId[];

  /** Players removed by timeout, in elimination order */
  eliminated: PlayerId[];

  displayNames: Record<PlayerId, string>;

  currentTurnIndex: number;
  difficulty: Difficulty;

  /** 1-based round counter; 0 while in the lobby */
  round: number;

  /** Lower-case words already accepted in this session. Append-only. */
  usedWords: string[];

  constraint?: Constraint;
  turn?: TurnState;

  /** Last issued turn sequence number */
  turnSequence: number;

  scores: Record<PlayerId, number>;
  streaks: Record<PlayerId, number>;
  skipsUsed: Record<PlayerId, number>;
  reboundsUsed: Record<PlayerId, number>;

  /** Numeric seed used to derive deterministic letter draws for this session. */
  readonly seed: number;

  readonly createdAt: TimePoint;
}

/**
 * Persistence abstraction for the session table (one session per chat).
 * Implementations must handle atomicity of {@link SessionGateway.updateLobby} and
 * {@link SessionGateway.claimTurn} internally.
 */
export interface SessionGateway {
  /** Load the session for a chat; fails with `NoActiveSession` when there is none. */
  loadSession(chatId: ChatId): Promise<SessionState>;

  findSession(chatId: ChatId): Promise<SessionState | undefined>;

  /**
   * Create a new session. Fails with `AlreadyOpen` when the chat already has one.
   */
  createSession(
    chatId: ChatId,
    host: PlayerId,
    displayName: string,
    phase: "lobby" | "practice",
    difficulty: Difficulty,
    createdAt: TimePoint,
  ): Promise<SessionState>;

  /**
   * Apply `mutate` to the stored lobby as one step, with no other write in between, and persist the
   * result. Fails with `NotInLobby` unless the session exists and is in the `lobby` phase. When
   * the mutator throws, nothing is stored.
   */
  updateLobby<TResult>(
    chatId: ChatId,
    mutate: (state: SessionState) => TResult,
  ): Promise<{ readonly state: SessionState; readonly result: TResult }>;

  /**
   * Persist a complete snapshot. `usedWords` is merged with the stored set rather than replaced.
   * Fails with `NoActiveSession` when the session was deleted in the meantime.
   */
  saveSession(state: SessionState): Promise<void>;

  /**
   * Atomically move the live turn from `awaiting` to `resolving`, but only when its sequence
   * matches. Returns whether this caller won the turn.
   */
  claimTurn(chatId: ChatId, sequence: number): Promise<boolean>;

  /** Remove the session. Returns false when nothing was stored. */
  deleteSession(chatId: ChatId): Promise<boolean>;
}
