import {
  addPlayer,
  advance,
  advanceAutomatically,
  createGameState,
  currentTurn,
  getPlayer,
  placeShip,
  winner,
} from "../domain/entities/GameRules.js";
import { placeShipsAutomatically, type Shot } from "../domain/entities/PlayerRules.js";
import type { Rng } from "../domain/entities/random.js";
import { createGameConfig, type GameConfig } from "../domain/GameConfig.js";
import type { GameState, PlayerState } from "../domain/ports/GameGateway.js";
import type { AttackResult, Direction, Location, PlayerId, ShipId } from "../domain/typedefs.js";
import type { Play } from "./Play.js";

/** A whole game held in process, used for play against the computer. */
export class LocalGame implements Play {
  readonly #state: GameState;
  readonly #rng: Rng;

  constructor(config: GameConfig = createGameConfig(), rng: Rng = Math.random) {
    this.#state = createGameState(1, config, Date.now());
    this.#rng = rng;
  }

  addPlayer(name: string): PlayerId {
    return addPlayer(this.#state, name);
  }

  async placeShip(
    playerId: PlayerId,
    shipId: ShipId,
    location: Location,
    direction: Direction,
  ): Promise<void> {
    placeShip(this.#state, playerId, shipId, location, direction);
  }

  placeShipsAutomatically(playerId: PlayerId): void {
    placeShipsAutomatically(getPlayer(this.#state, playerId), this.#rng);
  }

  async advance(attacker: PlayerId, target: PlayerId, location: Location): Promise<AttackResult> {
    return advance(this.#state, attacker, target, location);
  }

  advanceAutomatically(attacker: PlayerId, target: PlayerId): Shot {
    return advanceAutomatically(this.#state, attacker, target, this.#rng);
  }

  getPlayer(playerId: PlayerId): PlayerState {
    return getPlayer(this.#state, playerId);
  }

  currentTurn(): PlayerId | undefined {
    return currentTurn(this.#state);
  }

  winner(): PlayerId | undefined {
    return winner(this.#state);
  }

  get config(): GameConfig {
    return this.#state.config;
  }
}
