import { iterateField, type FieldState } from "@battleship/core/domain/entities/BattleField.js";
import { rowToLetter } from "@battleship/core/domain/entities/Coordinates.js";
import { shipContains, type ShipState } from "@battleship/core/domain/entities/Fleet.js";
import type { PlayerState } from "@battleship/core/domain/ports/GameGateway.js";
import type { Cell } from "@battleship/core/domain/typedefs.js";

const COLUMN_WIDTH = 22;
const GUTTER = "    ";

const CELL_MARKS: Readonly<Record<Exclude<Cell, "empty">, string>> = {
  miss: "M",
  hit: "X",
};

/**
 * Draws a field as text: column numbers across the top, row letters down the
 * side, `#` for an untouched ship segment, `M` for a miss and `X` for a hit.
 */
export function formatBattlefield(
  field: FieldState,
  ships: readonly ShipState[] = [],
): string[] {
  const separator = " " + " -".repeat(field.width);

  let header = " ";
  for (let column = 1; column <= field.width; column += 1) {
    header += ` ${column}`;
  }

  const rows: string[][] = Array.from({ length: field.height }, () => []);
  for (const [location, cell] of iterateField(field)) {
    const mark =
      cell === "empty"
        ? ships.some((ship) => shipContains(ship, location))
          ? "#"
          : " "
        : CELL_MARKS[cell];
    rows[location.row]?.push(mark);
  }

  const lines = [header, separator];
  rows.forEach((marks, row) => {
    lines.push(`${rowToLetter(row)}|${marks.join("|")}|`);
    lines.push(separator);
  });
  return lines;
}

/** The player's guesses at the enemy beside their own waters. */
export function formatBoards(player: PlayerState): string[] {
  const enemy = formatBattlefield(player.speculativeField);
  const home = formatBattlefield(player.ownField, player.ships);

  const lines = [sideBySide("Enemy", "Home")];
  const count = Math.min(enemy.length, home.length);
  for (let index = 0; index < count; index += 1) {
    lines.push(sideBySide(enemy[index] ?? "", home[index] ?? ""));
  }
  return lines;
}

function sideBySide(left: string, right: string): string {
  return `${left.padEnd(COLUMN_WIDTH)}${GUTTER}${right.padEnd(COLUMN_WIDTH)}`;
}
