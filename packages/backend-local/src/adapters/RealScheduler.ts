/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { ChatId, CommandContext, Logger, Scheduler } from "../core.js";
import { TurnTimeout, dispatchCommand } from "../core.js";

type DispatchTimeout = (command: TurnTimeout, ctx: CommandContext) => Promise<unknown>;

interface RealSchedulerOptions {
  readonly dispatch?: DispatchTimeout;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
}

/** One `setTimeout` per chat; scheduling replaces the pending turn clock. */
export class RealScheduler implements Scheduler {
  #timers: Map<ChatId, ReturnType<typeof setTimeout>> = new Map();
  readonly #dispatch: DispatchTimeout;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
  }

  get pendingCount(): number {
    return this.#timers.size;
  }

  async scheduleTurnTimeout(chatId: ChatId, sequence: number, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    this.#clear(chatId);

    const timer = setTimeout(async () => {
      this.#timers.delete(chatId);
      try {
        const context = await this.#contextFactory();
        await this.#dispatch(new TurnTimeout(chatId, sequence, Date.now()), context);
      } catch (error) {
        this.#logger?.error?.("Failed to dispatch turn timeout", {
          chatId,
          sequence,
          error,
        });
      }
    }, delayMs);

    this.#timers.set(chatId, timer);
    this.#logger?.debug?.("Turn timeout scheduled", { chatId, sequence, delayMs });
  }

  async cancelTurnTimeout(chatId: ChatId): Promise<void> {
    if (this.#clear(chatId)) {
      this.#logger?.debug?.("Turn timeout cancelled", { chatId });
    }
  }

  /** Drops every pending timer, for shutdown. */
  dispose(): void {
    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();
  }

  #clear(chatId: ChatId): boolean {
    const existing = this.#timers.get(chatId);
    if (!existing) {
      return false;
    }
    clearTimeout(existing);
    this.#timers.delete(chatId);
    return true;
  }
}
