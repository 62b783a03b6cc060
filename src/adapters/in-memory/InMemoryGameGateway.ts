/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { assertValidGameState, createGameState } from "../../domain/entities/GameRules.js";
import { GameRuleError } from "../../domain/errors/GameRuleError.js";
import type { GameConfig } from "../../domain/GameConfig.js";
import type { GameGateway, GameState } from "../../domain/ports/GameGateway.js";
import type { GameId, TimePoint } from "../../domain/typedefs.js";

export class InMemoryGameGateway implements GameGateway {
  #games = new Map<GameId, GameState>();

  async loadGameState(gameId: GameId): Promise<GameState> {
    const state = this.#games.get(gameId);
    if (!state) {
      throw GameRuleError.unknownGame();
    }
    return this.#clone(state);
  }

  async saveGameState(state: GameState): Promise<void> {
    if (!this.#games.has(state.id)) {
      throw GameRuleError.unknownGame();
    }
    assertValidGameState(state);
    this.#games.set(state.id, this.#clone(state));
  }

  async createGame(config: GameConfig, createdAt: TimePoint): Promise<GameState> {
    const id = this.#nextId();
    const state = createGameState(id, { ...config, fleet: [...config.fleet] }, createdAt);
    this.#games.set(id, this.#clone(state));
    return this.#clone(state);
  }

  #nextId(): GameId {
    let highest = 0;
    for (const id of this.#games.keys()) {
      highest = Math.max(highest, id);
    }
    return highest + 1;
  }

  #clone(state: GameState): GameState {
    return structuredClone(state);
  }
}
