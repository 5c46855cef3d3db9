export { AchievementError } from "./AchievementError.js";
export { EconomyError, type EconomyErrorCode } from "./EconomyError.js";
export { GameCommandInputError } from "./GameCommandInputError.js";
export { InvalidSessionStateError } from "./InvalidSessionStateError.js";
export { PlayerNotFoundError } from "./PlayerNotFoundError.js";
export { SessionStateError, type SessionStateErrorCode } from "./SessionStateError.js";

import { AchievementError } from "./AchievementError.js";
import { EconomyError } from "./EconomyError.js";
import { GameCommandInputError } from "./GameCommandInputError.js";
import { SessionStateError } from "./SessionStateError.js";

export type DomainRejection =
  | SessionStateError
  | EconomyError
  | AchievementError
  | GameCommandInputError;

/** Expected, player-facing failures; anything else is a defect. */
export function isDomainRejection(error: unknown): error is DomainRejection {
  return (
    error instanceof SessionStateError ||
    error instanceof EconomyError ||
    error instanceof AchievementError ||
    error instanceof GameCommandInputError
  );
}
