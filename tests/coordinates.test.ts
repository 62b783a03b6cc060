import { describe, expect, it } from "vitest";

import {
  formatDirection,
  formatLocation,
  neighbors,
  parseDirection,
  parseLocation,
  rowToLetter,
  translate,
} from "../src/domain/entities/Coordinates.js";

describe("parseLocation", () => {
  it("reads the row letter and one-based column", () => {
    expect(parseLocation("A, 1")).toEqual({ column: 0, row: 0 });
    expect(parseLocation("B, 2")).toEqual({ column: 1, row: 1 });
    expect(parseLocation("  j,10 ")).toEqual({ column: 9, row: 9 });
  });

  it("rejects a numeric row", () => {
    expect(() => parseLocation("12, 9")).toThrow("invalid row; should be (A-Z)");
  });

  it("rejects a non-numeric column", () => {
    expect(() => parseLocation("B, C")).toThrow("invalid column; invalid digit found in string");
  });

  it("reports missing and empty columns", () => {
    expect(() => parseLocation("B")).toThrow("unexpected end of input");
    expect(() => parseLocation("B, ")).toThrow(
      "invalid column; cannot parse integer from empty string",
    );
    expect(() => parseLocation("B, 0")).toThrow("invalid column");
  });

  it("formats locations back the way players type them", () => {
    expect(formatLocation({ column: 6, row: 1 })).toBe("B, 7");
    expect(rowToLetter(25)).toBe("Z");
  });
});

describe("parseDirection", () => {
  it("accepts any casing", () => {
    expect(parseDirection(" North ")).toBe("north");
    expect(parseDirection("WEST")).toBe("west");
    expect(formatDirection("south")).toBe("South");
  });

  it("names the rejected direction", () => {
    expect(() => parseDirection("Up")).toThrow("invalid direction: up");
  });
});

describe("translate", () => {
  it("moves along the direction", () => {
    expect(translate({ column: 2, row: 3 }, "east", 2)).toEqual({ column: 4, row: 3 });
    expect(translate({ column: 2, row: 3 }, "north", 3)).toEqual({ column: 2, row: 0 });
  });

  it("gives nothing past the origin", () => {
    expect(translate({ column: 0, row: 0 }, "north", 1)).toBeUndefined();
    expect(translate({ column: 1, row: 0 }, "west", 2)).toBeUndefined();
  });

  it("lists neighbours east, west, south, north", () => {
    expect(neighbors({ column: 1, row: 1 })).toEqual([
      { column: 2, row: 1 },
      { column: 0, row: 1 },
      { column: 1, row: 2 },
      { column: 1, row: 0 },
    ]);
    expect(neighbors({ column: 0, row: 0 })).toEqual([
      { column: 1, row: 0 },
      { column: 0, row: 1 },
    ]);
  });
});
