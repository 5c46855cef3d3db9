import type { GameConfig } from "../GameConfig.js";
import type { Dictionary } from "../ports/Dictionary.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { PlayerGateway } from "../ports/PlayerGateway.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { SessionGateway } from "../ports/SessionGateway.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly sessionGateway: SessionGateway;
  readonly playerGateway: PlayerGateway;
  readonly dictionary: Dictionary;
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly config: GameConfig;
  readonly logger?: Logger;
}

export abstract class Command<TResult = unknown> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
