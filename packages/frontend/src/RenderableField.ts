import { getCell, type FieldState } from "@battleship/core/domain/entities/BattleField.js";
import {
  createLocation,
  rowToLetter,
  sameLocation,
} from "@battleship/core/domain/entities/Coordinates.js";
import { shipContains, type ShipState } from "@battleship/core/domain/entities/Fleet.js";
import type { Location } from "@battleship/core/domain/typedefs.js";

import type { DrawingContext } from "./DrawingContext.js";

export const FIELD_COLORS = {
  label: "black",
  water: "white",
  hover: "#ded9d9",
  ship: "#799394",
  miss: "#1ce5ed",
  hit: "#ff6600",
} as const;

/** A board drawn at a fixed canvas position, with row letters down the side and column numbers on top. */
export class RenderableField {
  static readonly HEADER_SIZE = 15;
  static readonly CELL_SIZE = 50;

  constructor(
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number,
  ) {}

  /** Board cell under canvas point (`px`, `py`), if any. */
  locationAt(px: number, py: number): Location | undefined {
    const gridX = this.x + RenderableField.HEADER_SIZE;
    const gridY = this.y + RenderableField.HEADER_SIZE;
    if (px < gridX || py < gridY) {
      return undefined;
    }

    const column = Math.floor((px - gridX) / RenderableField.CELL_SIZE);
    const row = Math.floor((py - gridY) / RenderableField.CELL_SIZE);
    if (column >= this.width || row >= this.height) {
      return undefined;
    }
    return createLocation(column, row);
  }

  render(
    context: DrawingContext,
    field: FieldState,
    ships: readonly ShipState[],
    hover: Location | undefined,
  ): void {
    const { CELL_SIZE, HEADER_SIZE } = RenderableField;
    const gridX = this.x + HEADER_SIZE;
    const gridY = this.y + HEADER_SIZE;
    const right = gridX + this.width * CELL_SIZE;
    const bottom = gridY + this.height * CELL_SIZE;

    for (let row = 0; row < this.height; row += 1) {
      for (let column = 0; column < this.width; column += 1) {
        const location = createLocation(column, row);
        context.fillStyle = this.#cellColor(field, ships, location, hover);
        context.fillRect(
          gridX + column * CELL_SIZE,
          gridY + row * CELL_SIZE,
          CELL_SIZE,
          CELL_SIZE,
        );
      }
    }

    context.fillStyle = FIELD_COLORS.label;
    context.font = "10px arial";

    for (let row = 0; row <= this.height; row += 1) {
      const lineY = gridY + row * CELL_SIZE;
      context.moveTo(gridX, lineY);
      context.lineTo(right, lineY);
      if (row < this.height) {
        context.fillText(rowToLetter(row), this.x, lineY + (CELL_SIZE * 3) / 4);
      }
    }

    for (let column = 0; column <= this.width; column += 1) {
      const lineX = gridX + column * CELL_SIZE;
      context.moveTo(lineX, gridY);
      context.lineTo(lineX, bottom);
      if (column < this.width) {
        context.fillText(String(column + 1), lineX + (CELL_SIZE * 3) / 4 - HEADER_SIZE, this.y + 10);
      }
    }
  }

  #cellColor(
    field: FieldState,
    ships: readonly ShipState[],
    location: Location,
    hover: Location | undefined,
  ): string {
    switch (getCell(field, location)) {
      case "miss":
        return FIELD_COLORS.miss;
      case "hit":
        return FIELD_COLORS.hit;
      case "empty":
        break;
    }
    if (ships.some((ship) => shipContains(ship, location))) {
      return FIELD_COLORS.ship;
    }
    if (hover && sameLocation(hover, location)) {
      return FIELD_COLORS.hover;
    }
    return FIELD_COLORS.water;
  }
}
