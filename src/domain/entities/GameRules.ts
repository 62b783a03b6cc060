import { GameRuleError } from "../errors/GameRuleError.js";
import { InvalidGameStateError } from "../errors/InvalidGameStateError.js";
import type { GameConfig } from "../GameConfig.js";
import type { GameState, PlayerState } from "../ports/GameGateway.js";
import type {
  AttackResult,
  Direction,
  GameId,
  Location,
  PlayerId,
  ShipId,
  TimePoint,
} from "../typedefs.js";
import { gameIdOf, isPlayerId, parsePlayerId, playerIdOf } from "../typedefs.js";
import type { Rng } from "./random.js";
import {
  attack,
  attackAutomatically,
  createPlayer,
  isDead,
  placeShip as placePlayerShip,
  shipsPlaced,
  type Shot,
} from "./PlayerRules.js";

export function createGameState(
  id: GameId,
  config: GameConfig,
  createdAt: TimePoint,
): GameState {
  return {
    id,
    config,
    players: [],
    turn: undefined,
    lastAttack: undefined,
    createdAt,
  };
}

export function addPlayer(game: GameState, name: string): PlayerId {
  if (game.players.length >= game.config.maxPlayers) {
    throw GameRuleError.tooManyPlayers();
  }

  const highest = game.players.reduce(
    (max, player) => Math.max(max, parsePlayerId(player.id).index),
    0,
  );
  const id = playerIdOf(game.id, highest + 1);
  game.players.push(createPlayer(id, name, game.config));
  game.turn = id;
  return id;
}

export function findPlayer(game: GameState, playerId: PlayerId): PlayerState | undefined {
  return game.players.find((player) => player.id === playerId);
}

export function getPlayer(game: GameState, playerId: PlayerId): PlayerState {
  const player = findPlayer(game, playerId);
  if (!player) {
    throw GameRuleError.unknownPlayer();
  }
  return player;
}

export function getPlayerIds(game: GameState): PlayerId[] {
  return game.players.map((player) => player.id);
}

export function otherPlayerIds(game: GameState, playerId: PlayerId): PlayerId[] {
  return getPlayerIds(game).filter((id) => id !== playerId);
}

function isFull(game: GameState): boolean {
  return game.players.length === game.config.maxPlayers;
}

/** Defined once the game is full and every fleet is placed. */
export function currentTurn(game: GameState): PlayerId | undefined {
  if (isFull(game) && game.players.every(shipsPlaced)) {
    return game.turn;
  }
  return undefined;
}

export function winner(game: GameState): PlayerId | undefined {
  if (!isFull(game)) return undefined;
  const alive = game.players.filter((player) => !isDead(player));
  const [survivor] = alive;
  return alive.length === 1 && survivor ? survivor.id : undefined;
}

export function placeShip(
  game: GameState,
  playerId: PlayerId,
  shipId: ShipId,
  location: Location,
  direction: Direction,
): void {
  placePlayerShip(getPlayer(game, playerId), shipId, location, direction);
}

function requireTurn(game: GameState, attackerId: PlayerId): PlayerState {
  const attacker = getPlayer(game, attackerId);
  if (winner(game) !== undefined) {
    throw GameRuleError.gameOver();
  }
  if (currentTurn(game) !== attackerId) {
    throw GameRuleError.notYourTurn(attacker.name);
  }
  return attacker;
}

function nextTurn(game: GameState): void {
  const ids = getPlayerIds(game);
  const index = game.turn === undefined ? -1 : ids.indexOf(game.turn);
  game.turn = ids[(index + 1) % ids.length];
}

export function advance(
  game: GameState,
  attackerId: PlayerId,
  targetId: PlayerId,
  guess: Location,
): AttackResult {
  const attacker = requireTurn(game, attackerId);
  if (attackerId === targetId) {
    throw GameRuleError.invalidSelfAttack();
  }
  const target = getPlayer(game, targetId);

  const result = attack(attacker, target, guess);
  game.lastAttack = { attacker: attackerId, target: targetId, location: guess, result };
  nextTurn(game);
  return result;
}

export function advanceAutomatically(
  game: GameState,
  attackerId: PlayerId,
  targetId: PlayerId,
  rng?: Rng,
): Shot {
  const attacker = requireTurn(game, attackerId);
  if (attackerId === targetId) {
    throw GameRuleError.invalidSelfAttack();
  }
  const target = getPlayer(game, targetId);

  const shot = attackAutomatically(attacker, target, rng);
  game.lastAttack = { attacker: attackerId, target: targetId, ...shot };
  nextTurn(game);
  return shot;
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check of a stored game
// -----------------------------------------------------------------------------
export function assertValidGameState(state: GameState): void {
  const fail = (reason: string): never => {
    throw new InvalidGameStateError(reason, state);
  };

  const { config } = state;

  if (!Number.isInteger(state.id) || state.id < 1) fail("invalid game id");
  if (!Array.isArray(state.players)) fail("missing players");
  if (state.players.length > config.maxPlayers) fail("too many players");

  const ids = getPlayerIds(state);
  if (new Set(ids).size !== ids.length) fail("duplicate player IDs");

  for (const player of state.players) {
    if (!isPlayerId(player.id) || gameIdOf(player.id) !== state.id)
      fail(`player ${player.id} does not belong to game ${state.id}`);

    for (const field of [player.ownField, player.speculativeField]) {
      if (
        field.width !== config.boardWidth ||
        field.height !== config.boardHeight ||
        field.cells.length !== field.width * field.height
      )
        fail(`field size mismatch for ${player.id}`);
    }

    if (player.ships.length !== config.fleet.length) fail(`fleet mismatch for ${player.id}`);
  }

  if (state.turn !== undefined && !ids.includes(state.turn))
    fail("turn holder not in player list");

  if (state.lastAttack) {
    const { attacker, target } = state.lastAttack;
    if (!ids.includes(attacker) || !ids.includes(target)) fail("last attack by unknown player");
  }
}
