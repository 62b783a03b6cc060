import type { Direction, Location } from "../typedefs.js";

const A_TO_Z = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

export function rowToLetter(row: number): string {
  return A_TO_Z.charAt(row % A_TO_Z.length);
}

export function formatLocation(location: Location): string {
  return `${rowToLetter(location.row)}, ${location.column + 1}`;
}

export function formatDirection(direction: Direction): string {
  return direction.charAt(0).toUpperCase() + direction.slice(1);
}

export function createLocation(column: number, row: number): Location {
  return { column, row };
}

export function sameLocation(a: Location, b: Location): boolean {
  return a.column === b.column && a.row === b.row;
}

/**
 * Parses the `<row letter>, <column>` form players type, e.g. `B, 7`.
 * Throws with the message to show the player.
 */
export function parseLocation(text: string): Location {
  const [rowPart, columnPart] = text.split(",");
  if (rowPart === undefined) {
    throw new Error("unexpected end of input");
  }

  const letter = rowPart.trim().toUpperCase();
  const row = letter.length === 1 ? A_TO_Z.indexOf(letter) : -1;
  if (row < 0) {
    throw new Error("invalid row; should be (A-Z)");
  }

  if (columnPart === undefined) {
    throw new Error("unexpected end of input");
  }

  const digits = columnPart.trim();
  if (!/^\d+$/.test(digits)) {
    throw new Error(
      digits.length === 0
        ? "invalid column; cannot parse integer from empty string"
        : "invalid column; invalid digit found in string",
    );
  }

  const column = Number(digits);
  if (column === 0) {
    throw new Error("invalid column");
  }

  return createLocation(column - 1, row);
}

export function parseDirection(text: string): Direction {
  const normalized = text.trim().toLowerCase();
  switch (normalized) {
    case "north":
    case "south":
    case "east":
    case "west":
      return normalized;
    default:
      throw new Error(`invalid direction: ${normalized}`);
  }
}

/** Moves `magnitude` cells; `undefined` when the result would be negative. */
export function translate(
  location: Location,
  direction: Direction,
  magnitude: number,
): Location | undefined {
  let { column, row } = location;
  switch (direction) {
    case "north":
      row -= magnitude;
      break;
    case "south":
      row += magnitude;
      break;
    case "east":
      column += magnitude;
      break;
    case "west":
      column -= magnitude;
      break;
  }

  if (column < 0 || row < 0) {
    return undefined;
  }
  return createLocation(column, row);
}

/** East, west, south and north neighbours that stay non-negative. */
export function neighbors(location: Location): Location[] {
  const result: Location[] = [];
  for (const direction of ["east", "west", "south", "north"] as const) {
    const next = translate(location, direction, 1);
    if (next && !result.some((existing) => sameLocation(existing, next))) {
      result.push(next);
    }
  }
  return result;
}
