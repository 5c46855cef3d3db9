import type { ChatId } from "../typedefs.js";

/**
 * Infrastructure abstraction responsible for delivering turn timeouts to the domain.
 *
 * Implementations keep at most one pending timeout per chat: scheduling replaces whatever was
 * pending, and cancelling drops it. A timeout that fires anyway carries its turn sequence, so the
 * domain discards it when the turn has moved on.
 */
export interface Scheduler {
  scheduleTurnTimeout(chatId: ChatId, sequence: number, delayMs: number): Promise<void>;
  cancelTurnTimeout(chatId: ChatId): Promise<void>;
}
