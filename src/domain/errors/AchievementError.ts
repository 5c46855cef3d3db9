import type { TitleId } from "../typedefs.js";

export class AchievementError extends Error {
  readonly kind = "AchievementError" as const;
  readonly code = "NotUnlocked" as const;

  constructor(public readonly title: TitleId) {
    super(`Title not unlocked: ${title}`);
    this.name = "AchievementError";
  }
}
