import { describe, expect, it } from "vitest";

import { formatBattlefield, formatBoards } from "../../packages/cli/src/render.js";
import { createField, recordHit, recordMiss } from "../../src/domain/entities/BattleField.js";
import type { ShipState } from "../../src/domain/entities/Fleet.js";
import { createPlayer } from "../../src/domain/entities/PlayerRules.js";
import { createGameConfig } from "../../src/domain/GameConfig.js";

describe("formatBattlefield", () => {
  it("draws an empty grid with labels", () => {
    expect(formatBattlefield(createField(3, 2))).toEqual([
      "  1 2 3",
      "  - - -",
      "A| | | |",
      "  - - -",
      "B| | | |",
      "  - - -",
    ]);
  });

  it("marks ships, hits and misses", () => {
    const field = createField(3, 2);
    recordHit(field, { column: 1, row: 0 });
    recordMiss(field, { column: 2, row: 1 });
    const patrolBoat: ShipState = {
      id: 1,
      kind: "patrolBoat",
      hits: 1,
      placement: { location: { column: 0, row: 0 }, direction: "east" },
    };

    expect(formatBattlefield(field, [patrolBoat]).slice(2)).toEqual([
      "A|#|X| |",
      "  - - -",
      "B| | |M|",
      "  - - -",
    ]);
  });
});

describe("formatBoards", () => {
  it("puts the enemy board beside the home board", () => {
    const lines = formatBoards(createPlayer("1.1", "Alice", createGameConfig()));
    const header = "  1 2 3 4 5 6 7 8 9 10";

    expect(lines).toHaveLength(23);
    expect(lines[0]).toBe(`${"Enemy".padEnd(22)}    ${"Home".padEnd(22)}`);
    expect(lines[1]).toBe(`${header}    ${header}`);
  });
});
