import type { BoostKind } from "../typedefs.js";

export type EconomyErrorCode =
  | "InsufficientPoints"
  | "NotOwned"
  | "OnCooldown"
  | "SessionCapExceeded";

export class EconomyError extends Error {
  readonly kind = "EconomyError" as const;

  constructor(
    public readonly code: EconomyErrorCode,
    public readonly boost: BoostKind,
    message: string,
    /** Milliseconds left on the cooldown, for `OnCooldown` */
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = "EconomyError";
  }

  static insufficientPoints(boost: BoostKind, cost: number, balance: number): EconomyError {
    return new EconomyError(
      "InsufficientPoints",
      boost,
      `Buying ${boost} costs ${cost} points; balance is ${balance}`,
    );
  }

  static notOwned(boost: BoostKind): EconomyError {
    return new EconomyError("NotOwned", boost, `No ${boost} boost in inventory`);
  }

  static onCooldown(boost: BoostKind, retryAfterMs: number): EconomyError {
    return new EconomyError(
      "OnCooldown",
      boost,
      `${boost} is on cooldown for another ${Math.ceil(retryAfterMs / 1000)}s`,
      retryAfterMs,
    );
  }

  static sessionCapExceeded(boost: BoostKind, cap: number): EconomyError {
    return new EconomyError(
      "SessionCapExceeded",
      boost,
      `${boost} can be used at most ${cap} times per session`,
    );
  }
}
