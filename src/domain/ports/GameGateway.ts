import type { FieldState } from "../entities/BattleField.js";
import type { ShipState } from "../entities/Fleet.js";
import type { GameConfig } from "../GameConfig.js";
import type { AttackResult, GameId, Location, PlayerId, TimePoint } from "../typedefs.js";

/** Everything one player knows: their own waters and their guesses at the enemy's. */
export interface PlayerState {
  readonly id: PlayerId;
  readonly name: string;

  /** Shots the opponent has fired at this player */
  readonly ownField: FieldState;

  /** Shots this player has fired at the opponent */
  readonly speculativeField: FieldState;

  /** Fleet in ship-id order */
  readonly ships: ShipState[];
}

export interface AttackRecord {
  readonly attacker: PlayerId;
  readonly target: PlayerId;
  readonly location: Location;
  readonly result: AttackResult;
}

/**
 * The authoritative snapshot of one game.
 */
export interface GameState {
  readonly id: GameId;
  readonly config: GameConfig;

  /** Players in join order; turns rotate through this order */
  players: PlayerState[];

  /** Whose move it is once every fleet is placed */
  turn: PlayerId | undefined;

  /** Latest attack, held until its target collects it while waiting for their turn */
  lastAttack: AttackRecord | undefined;

  readonly createdAt: TimePoint;
}

/**
 * Persistence abstraction for games. Unknown ids raise an `UnknownGame` rule error.
 */
export interface GameGateway {
  createGame(config: GameConfig, createdAt: TimePoint): Promise<GameState>;
  loadGameState(gameId: GameId): Promise<GameState>;
  saveGameState(state: GameState): Promise<void>;
}
