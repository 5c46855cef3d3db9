import { equipTitle } from "../entities/Achievements.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { isTitleId, type PlayerId, type TimePoint, type TitleId } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";

export interface TitleState {
  readonly playerId: PlayerId;
  readonly titles: readonly TitleId[];
  readonly equippedTitle: TitleId | undefined;
}

export function parseTitle(raw: string): TitleId {
  const title = raw.trim().toUpperCase();
  if (!isTitleId(title)) {
    throw GameCommandInputError.because([`Unknown title: ${raw.trim()}`]);
  }
  return title;
}

export class EquipTitle extends Command<TitleState> {
  readonly type = "EquipTitle" as const;
  readonly title: TitleId;

  constructor(
    public readonly playerId: PlayerId,
    title: string,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ playerId });
    this.title = parseTitle(title);
  }

  async execute({ playerGateway, logger }: CommandContext): Promise<TitleState> {
    const { player } = await playerGateway.updatePlayer(this.playerId, (record) =>
      equipTitle(record, this.title),
    );

    logger?.info?.("Title equipped", {
      type: this.type,
      playerId: this.playerId,
      title: this.title,
    });

    return {
      playerId: player.id,
      titles: [...player.titles],
      equippedTitle: player.equippedTitle,
    };
  }
}
