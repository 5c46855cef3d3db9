import type { ChatId, Difficulty, PlayerId, TimePoint, TitleId } from "./typedefs.js";

export type RejectionReason =
  | "Empty"
  | "WrongLength"
  | "WrongLetter"
  | "AlreadyUsed"
  | "NotAWord";

/** Closed set of ways a turn can resolve (or, for RejectedInvalid, fail to). */
export type TurnOutcome =
  | {
      readonly type: "Accepted";
      readonly word: string;
      readonly points: number;
      readonly streak: number;
      readonly combo: boolean;
    }
  | { readonly type: "RejectedInvalid"; readonly reason: RejectionReason }
  | { readonly type: "Skipped" }
  | { readonly type: "Rebounded" }
  | { readonly type: "Forfeited" }
  | { readonly type: "TimedOut" };

export type TurnOutcomeType = TurnOutcome["type"];

export interface TurnInfo {
  readonly sequence: number;
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly letter: string;
  readonly length: number;
  readonly round: number;
  readonly deadline: TimePoint;
  readonly durationMs: number;
}

export interface RankingEntry {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly score: number;
}

export interface GameSummary {
  readonly chatId: ChatId;
  readonly mode: "multiplayer" | "practice";
  readonly reason: "winner" | "stopped" | "practiceOver";
  readonly winner: PlayerId | undefined;
  readonly rounds: number;
  readonly difficulty: Difficulty;
  readonly ranking: readonly RankingEntry[];
}

export interface TurnReport {
  readonly chatId: ChatId;
  readonly playerId: PlayerId;
  readonly sequence: number;
  readonly outcome: TurnOutcome;
  readonly eliminated?: PlayerId;
  readonly next?: TurnInfo;
  readonly gameOver?: GameSummary;
  readonly unlocked?: readonly TitleId[];
}

export interface RosterEntry {
  readonly playerId: PlayerId;
  readonly displayName: string;
}

export interface LobbySnapshot {
  readonly chatId: ChatId;
  readonly host: PlayerId;
  readonly difficulty: Difficulty;
  readonly players: readonly RosterEntry[];
}

export interface GameStart {
  readonly chatId: ChatId;
  readonly mode: "multiplayer" | "practice";
  readonly difficulty: Difficulty;
  readonly players: readonly RosterEntry[];
  readonly turn: TurnInfo;
}

export interface HintResult {
  readonly chatId: ChatId;
  readonly playerId: PlayerId;
  readonly sequence: number;
  readonly letter: string;
  readonly length: number;
  /** Unused dictionary words meeting the constraint, shortest first then alphabetical */
  readonly words: readonly string[];
  readonly remaining: number;
}
