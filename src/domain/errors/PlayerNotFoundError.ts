import type { PlayerId } from "../typedefs.js";

export class PlayerNotFoundError extends Error {
  constructor(playerId: PlayerId) {
    super(`Player not found: ${playerId}`);
    this.name = "PlayerNotFoundError";
  }
}
