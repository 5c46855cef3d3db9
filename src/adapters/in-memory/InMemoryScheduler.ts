/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { TurnTimeout } from "../../domain/commands/TurnTimeout.js";
import type { Scheduler } from "../../domain/ports/Scheduler.js";
import type { ChatId, TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used exclusively in tests.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records queued timeouts and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). At most one timeout is
 * pending per chat; scheduling another replaces it.
 */
interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly TurnTimeout[];
}

export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: (command: TurnTimeout) => Promise<unknown> | void;
  #state: SchedulerState;

  constructor(
    dispatch: (command: TurnTimeout) => Promise<unknown> | void,
    startAt: TimePoint = 0,
  ) {
    this.#dispatch = dispatch;
    this.#state = { now: startAt, queue: [] };
  }

  get now(): TimePoint {
    return this.#state.now;
  }

  /** Timeouts still waiting to fire, in firing order. */
  get pending(): readonly TurnTimeout[] {
    return this.#state.queue;
  }

  async scheduleTurnTimeout(chatId: ChatId, sequence: number, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const command = new TurnTimeout(chatId, sequence, this.#state.now + delayMs);
    const remaining = this.#state.queue.filter((existing) => existing.chatId !== chatId);
    const insertAt = remaining.findIndex((existing) => existing.at > command.at);
    const queue =
      insertAt === -1
        ? [...remaining, command]
        : [...remaining.slice(0, insertAt), command, ...remaining.slice(insertAt)];

    this.#state = { ...this.#state, queue };
  }

  async cancelTurnTimeout(chatId: ChatId): Promise<void> {
    const queue = this.#state.queue.filter((existing) => existing.chatId !== chatId);
    this.#state = { ...this.#state, queue };
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    let state = this.#state;

    while (state.queue.length > 0) {
      const [next, ...remaining] = state.queue;
      if (!next) {
        break;
      }
      if (next.at > targetTime) {
        break;
      }

      state = { now: next.at, queue: remaining };
      this.#state = state;
      await this.#dispatch(next);
      state = this.#state;
    }

    this.#state = { now: targetTime, queue: state.queue };
  }
}
