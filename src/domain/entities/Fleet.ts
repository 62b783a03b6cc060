import { GameRuleError } from "../errors/GameRuleError.js";
import type {
  AttackResult,
  Direction,
  Location,
  ShipId,
  ShipKind,
} from "../typedefs.js";
import { sameLocation, translate } from "./Coordinates.js";
import { type FieldState, isOnField, requireValidLocation } from "./BattleField.js";

const SHIP_SIZES: Readonly<Record<ShipKind, number>> = {
  carrier: 5,
  battleship: 4,
  destroyer: 3,
  submarine: 3,
  patrolBoat: 2,
};

const SHIP_NAMES: Readonly<Record<ShipKind, string>> = {
  carrier: "Carrier",
  battleship: "Battleship",
  destroyer: "Destroyer",
  submarine: "Submarine",
  patrolBoat: "PatrolBoat",
};

export interface Placement {
  readonly location: Location;
  readonly direction: Direction;
}

export interface ShipState {
  readonly id: ShipId;
  readonly kind: ShipKind;
  hits: number;
  placement: Placement | undefined;
}

export function shipSize(kind: ShipKind): number {
  return SHIP_SIZES[kind];
}

export function shipName(kind: ShipKind): string {
  return SHIP_NAMES[kind];
}

/** Ships are numbered from 1 in fleet order. */
export function createFleet(kinds: readonly ShipKind[]): ShipState[] {
  return kinds.map((kind, index) => ({
    id: index + 1,
    kind,
    hits: 0,
    placement: undefined,
  }));
}

export function isPlaced(ship: ShipState): boolean {
  return ship.placement !== undefined;
}

export function isSunk(ship: ShipState): boolean {
  return ship.hits >= shipSize(ship.kind);
}

/** Every cell the ship covers when laid out from `location`, as far as the board origin allows. */
export function segments(
  kind: ShipKind,
  location: Location,
  direction: Direction,
): Location[] {
  const result: Location[] = [];
  for (let step = 0; step < shipSize(kind); step += 1) {
    const segment = translate(location, direction, step);
    if (segment) result.push(segment);
  }
  return result;
}

/**
 * Packs the fleet end to end along parallel rows, or failing that along
 * columns, longest ship first. Placements come back in fleet order;
 * `undefined` when neither packing fits the board.
 */
export function lineLayout(
  kinds: readonly ShipKind[],
  width: number,
  height: number,
): Placement[] | undefined {
  return (
    packLines(kinds, height, width, (line, offset) => ({
      location: { column: offset, row: line },
      direction: "east",
    })) ??
    packLines(kinds, width, height, (line, offset) => ({
      location: { column: line, row: offset },
      direction: "south",
    }))
  );
}

function packLines(
  kinds: readonly ShipKind[],
  lineCount: number,
  lineLength: number,
  place: (line: number, offset: number) => Placement,
): Placement[] | undefined {
  const filled = Array.from({ length: lineCount }, () => 0);
  const placements: Placement[] = [];
  const longestFirst = kinds
    .map((kind, index) => ({ size: shipSize(kind), index }))
    .sort((a, b) => b.size - a.size);

  for (const { size, index } of longestFirst) {
    const line = filled.findIndex((used) => used + size <= lineLength);
    const offset = filled[line];
    if (offset === undefined) return undefined;
    placements[index] = place(line, offset);
    filled[line] = offset + size;
  }
  return placements;
}

export function shipContains(ship: ShipState, location: Location): boolean {
  if (!ship.placement) return false;
  return segments(ship.kind, ship.placement.location, ship.placement.direction).some(
    (segment) => sameLocation(segment, location),
  );
}

export function placeOnField(
  ship: ShipState,
  field: FieldState,
  location: Location,
  direction: Direction,
): void {
  requireValidLocation(field, location);

  const tail = translate(location, direction, shipSize(ship.kind) - 1);
  if (!tail || !isOnField(field, tail)) {
    throw GameRuleError.invalidShipLocation(location, direction);
  }

  if (ship.placement) {
    throw GameRuleError.shipAlreadyPlaced(ship.id);
  }
  ship.placement = { location, direction };
}

export function attackShip(ship: ShipState, location: Location): AttackResult {
  if (!shipContains(ship, location)) {
    return { kind: "miss" };
  }

  ship.hits += 1;
  if (isSunk(ship)) {
    return { kind: "sunk", ship: shipName(ship.kind) };
  }
  return { kind: "hit" };
}

export function isHit(result: AttackResult): boolean {
  return result.kind !== "miss";
}

export function describeAttack(result: AttackResult): string {
  switch (result.kind) {
    case "hit":
      return "a hit";
    case "miss":
      return "a miss";
    case "sunk":
      return `${result.ship} was sunk`;
  }
}
