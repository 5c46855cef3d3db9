/* eslint-disable functional/immutable-data */
import { PlayerNotFoundError } from "../../domain/errors/index.js";
import { createPlayerRecord } from "../../domain/entities/Players.js";
import type {
  PlayerGateway,
  PlayerRecord,
  PlayerUpdate,
} from "../../domain/ports/PlayerGateway.js";
import type { PlayerId, TimePoint } from "../../domain/typedefs.js";

export class InMemoryPlayerGateway implements PlayerGateway {
  #players = new Map<PlayerId, PlayerRecord>();
  readonly #startingBalance: number;

  constructor(startingBalance = 0) {
    this.#startingBalance = startingBalance;
  }

  async loadPlayer(playerId: PlayerId): Promise<PlayerRecord> {
    const player = this.#players.get(playerId);
    if (!player) throw new PlayerNotFoundError(playerId);
    return this.#clone(player);
  }

  async ensurePlayer(
    playerId: PlayerId,
    displayName: string,
    at: TimePoint,
  ): Promise<PlayerRecord> {
    const existing = this.#players.get(playerId);
    if (existing) {
      existing.displayName = displayName;
      return this.#clone(existing);
    }

    const player = createPlayerRecord(playerId, displayName, at, this.#startingBalance);
    this.#players.set(playerId, player);
    return this.#clone(player);
  }

  async updatePlayer<TResult>(
    playerId: PlayerId,
    mutate: (player: PlayerRecord) => TResult,
  ): Promise<PlayerUpdate<TResult>> {
    const stored = this.#players.get(playerId);
    if (!stored) throw new PlayerNotFoundError(playerId);

    // Mutate a draft so a throwing mutator leaves the stored record untouched.
    const draft = this.#clone(stored);
    const result = mutate(draft);
    this.#players.set(playerId, draft);

    return { player: this.#clone(draft), result };
  }

  async listPlayers(): Promise<readonly PlayerRecord[]> {
    return [...this.#players.values()].map((player) => this.#clone(player));
  }

  #clone(player: PlayerRecord): PlayerRecord {
    return structuredClone(player);
  }
}
