export type SessionStateErrorCode =
  | "AlreadyOpen"
  | "NotInLobby"
  | "AlreadyJoined"
  | "InsufficientPlayers"
  | "NoActiveSession"
  | "NotYourTurn"
  | "BoostsDisabledInPractice";

const MESSAGES: Record<SessionStateErrorCode, string> = {
  AlreadyOpen: "A game is already open in this chat",
  NotInLobby: "No lobby is open in this chat",
  AlreadyJoined: "Player already joined the lobby",
  InsufficientPlayers: "Not enough players to begin",
  NoActiveSession: "No active session in this chat",
  NotYourTurn: "It is not this player's turn",
  BoostsDisabledInPractice: "Boosts cannot be used in practice",
};

/**
 * Command is not valid for the session's current state. Recoverable: the relay
 * reports it back to the chat.
 */
export class SessionStateError extends Error {
  readonly kind = "StateError" as const;

  constructor(
    public readonly code: SessionStateErrorCode,
    message: string = MESSAGES[code],
  ) {
    super(message);
    this.name = "SessionStateError";
  }
}
