import { GameRuleError } from "../errors/GameRuleError.js";
import type { Cell, Location } from "../typedefs.js";
import { createLocation } from "./Coordinates.js";

/** Row-major grid of shot outcomes. */
export interface FieldState {
  readonly width: number;
  readonly height: number;
  readonly cells: Cell[];
}

export function createField(width = 10, height = 10): FieldState {
  return {
    width,
    height,
    cells: Array.from({ length: width * height }, (): Cell => "empty"),
  };
}

export function isOnField(field: FieldState, location: Location): boolean {
  return (
    Number.isInteger(location.column) &&
    Number.isInteger(location.row) &&
    location.column >= 0 &&
    location.row >= 0 &&
    location.column < field.width &&
    location.row < field.height
  );
}

export function requireValidLocation(field: FieldState, location: Location): void {
  if (!isOnField(field, location)) {
    throw GameRuleError.invalidLocation(location);
  }
}

export function getCell(field: FieldState, location: Location): Cell {
  requireValidLocation(field, location);
  return field.cells[location.row * field.width + location.column] ?? "empty";
}

export function recordHit(field: FieldState, location: Location): void {
  record(field, location, "hit");
}

export function recordMiss(field: FieldState, location: Location): void {
  record(field, location, "miss");
}

function record(field: FieldState, location: Location, cell: Cell): void {
  if (getCell(field, location) !== "empty") {
    throw GameRuleError.invalidLocation(location);
  }
  field.cells[location.row * field.width + location.column] = cell;
}

export function* iterateField(
  field: FieldState,
): Generator<readonly [Location, Cell]> {
  for (let index = 0; index < field.cells.length; index += 1) {
    const cell = field.cells[index] ?? "empty";
    yield [createLocation(index % field.width, Math.floor(index / field.width)), cell];
  }
}

export function emptyLocations(field: FieldState): Location[] {
  const result: Location[] = [];
  for (const [location, cell] of iterateField(field)) {
    if (cell === "empty") result.push(location);
  }
  return result;
}
