import { GameRuleError } from "../errors/GameRuleError.js";
import type { GameConfig } from "../GameConfig.js";
import type { PlayerState } from "../ports/GameGateway.js";
import type { AttackResult, Direction, Location, PlayerId, ShipId } from "../typedefs.js";
import { DIRECTIONS } from "../typedefs.js";
import {
  createField,
  emptyLocations,
  getCell,
  isOnField,
  iterateField,
  recordHit,
  recordMiss,
} from "./BattleField.js";
import { createLocation, neighbors } from "./Coordinates.js";
import {
  attackShip,
  createFleet,
  isHit,
  isPlaced,
  isSunk,
  lineLayout,
  placeOnField,
  segments,
  shipContains,
  shipName,
} from "./Fleet.js";
import { pickRandom, randomInt, type Rng } from "./random.js";

export function createPlayer(id: PlayerId, name: string, config: GameConfig): PlayerState {
  return {
    id,
    name,
    ownField: createField(config.boardWidth, config.boardHeight),
    speculativeField: createField(config.boardWidth, config.boardHeight),
    ships: createFleet(config.fleet),
  };
}

export function placeShip(
  player: PlayerState,
  shipId: ShipId,
  location: Location,
  direction: Direction,
): void {
  const ship = player.ships.find((candidate) => candidate.id === shipId);
  if (!ship) {
    throw GameRuleError.unknownShipId(shipId);
  }

  for (const other of player.ships) {
    if (other.id === shipId) continue;
    for (const segment of segments(ship.kind, location, direction)) {
      if (shipContains(other, segment)) {
        throw GameRuleError.shipPlacementConflict(shipName(other.kind));
      }
    }
  }

  placeOnField(ship, player.ownField, location, direction);
}

export interface Shot {
  readonly location: Location;
  readonly result: AttackResult;
}

const MAX_PLACEMENT_ATTEMPTS = 10_000;

export function placeShipsAutomatically(player: PlayerState, rng: Rng = Math.random): void {
  const { width, height } = player.ownField;
  for (const ship of player.ships) {
    let attempts = 0;
    while (!isPlaced(ship)) {
      attempts += 1;
      if (attempts > MAX_PLACEMENT_ATTEMPTS) {
        placeShipsInLines(player);
        return;
      }

      const location = createLocation(randomInt(rng, width), randomInt(rng, height));
      const direction = DIRECTIONS[randomInt(rng, DIRECTIONS.length)] ?? "south";
      try {
        placeShip(player, ship.id, location, direction);
      } catch (error) {
        if (!(error instanceof GameRuleError)) throw error;
      }
    }
  }
}

/** Starts the fleet over, packed along rows or columns, when random placement runs out of room. */
function placeShipsInLines(player: PlayerState): void {
  const { width, height } = player.ownField;
  const layout = lineLayout(
    player.ships.map((ship) => ship.kind),
    width,
    height,
  );
  if (!layout) {
    throw new Error(`Unable to find room for the fleet on a ${width}x${height} board`);
  }

  for (const ship of player.ships) {
    ship.placement = undefined;
  }
  player.ships.forEach((ship, index) => {
    const placement = layout[index];
    if (placement) placeShip(player, ship.id, placement.location, placement.direction);
  });
}

export function shipsPlaced(player: PlayerState): boolean {
  return player.ships.every(isPlaced);
}

export function isDead(player: PlayerState): boolean {
  return player.ships.every(isSunk);
}

export function attack(
  attacker: PlayerState,
  defender: PlayerState,
  location: Location,
): AttackResult {
  if (getCell(defender.ownField, location) !== "empty") {
    throw GameRuleError.invalidLocation(location);
  }

  let result: AttackResult = { kind: "miss" };
  for (const ship of defender.ships) {
    result = attackShip(ship, location);
    if (isHit(result)) break;
  }

  if (isHit(result)) {
    recordHit(defender.ownField, location);
    recordHit(attacker.speculativeField, location);
  } else {
    recordMiss(defender.ownField, location);
    recordMiss(attacker.speculativeField, location);
  }
  return result;
}

/**
 * Computer opponent: probe around earlier hits first, otherwise fire at a random
 * untouched cell.
 */
export function attackAutomatically(
  attacker: PlayerState,
  defender: PlayerState,
  rng: Rng = Math.random,
): Shot {
  for (const [location, cell] of iterateField(attacker.speculativeField)) {
    if (cell !== "hit") continue;
    for (const neighbor of neighbors(location)) {
      if (
        isOnField(defender.ownField, neighbor) &&
        getCell(defender.ownField, neighbor) === "empty"
      ) {
        return { location: neighbor, result: attack(attacker, defender, neighbor) };
      }
    }
  }

  const target = pickRandom(rng, emptyLocations(defender.ownField));
  if (!target) {
    throw GameRuleError.invalidLocation(createLocation(0, 0));
  }
  return { location: target, result: attack(attacker, defender, target) };
}
