import { grantTitle } from "../entities/Achievements.js";
import type { PlayerId, TimePoint, TitleId } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";
import { parseTitle, type TitleState } from "./EquipTitle.js";

/**
 * Administrative grant. The only way to obtain titles without an unlock rule, such as KAMI.
 */
export class GrantTitle extends Command<TitleState & { readonly granted: boolean }> {
  readonly type = "GrantTitle" as const;
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

  async execute({
    playerGateway,
    logger,
  }: CommandContext): Promise<TitleState & { readonly granted: boolean }> {
    const { player, result: granted } = await playerGateway.updatePlayer(
      this.playerId,
      (record) => grantTitle(record, this.title),
    );

    logger?.info?.("Title granted", {
      type: this.type,
      playerId: this.playerId,
      title: this.title,
      granted,
    });

    return {
      playerId: player.id,
      titles: [...player.titles],
      equippedTitle: player.equippedTitle,
      granted,
    };
  }
}
