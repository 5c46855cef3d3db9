import { purchaseBoost } from "../entities/BoostLedger.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import {
  BOOST_KINDS,
  isBoostKind,
  type BoostKind,
  type PlayerId,
  type TimePoint,
} from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidIds } from "./commandInput.js";

export interface PurchaseReceipt {
  readonly playerId: PlayerId;
  readonly boost: BoostKind;
  readonly cost: number;
  readonly balance: number;
  readonly owned: number;
}

export class BuyBoost extends Command<PurchaseReceipt> {
  readonly type = "BuyBoost" as const;
  readonly boost: BoostKind;

  constructor(
    public readonly playerId: PlayerId,
    boost: string,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidIds({ playerId });

    const kind = boost.trim().toLowerCase();
    if (!isBoostKind(kind)) {
      throw GameCommandInputError.because([`Boost must be one of: ${BOOST_KINDS.join(", ")}`]);
    }
    this.boost = kind;
  }

  async execute({ playerGateway, config, logger }: CommandContext): Promise<PurchaseReceipt> {
    const { player } = await playerGateway.updatePlayer(this.playerId, (record) =>
      purchaseBoost(record, this.boost, config),
    );

    logger?.info?.("Boost purchased", {
      type: this.type,
      playerId: this.playerId,
      boost: this.boost,
      balance: player.balance,
      at: this.at,
    });

    return {
      playerId: this.playerId,
      boost: this.boost,
      cost: config.boosts[this.boost].cost,
      balance: player.balance,
      owned: player.inventory[this.boost],
    };
  }
}
