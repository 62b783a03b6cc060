/* eslint-disable functional/immutable-data */
import type { FieldState } from "../domain/entities/BattleField.js";
import type { Placement, ShipState } from "../domain/entities/Fleet.js";
import { GAME_ERROR_CODES, type WireError } from "../domain/errors/GameRuleError.js";
import { ProtocolError } from "../domain/errors/ProtocolError.js";
import type { PlayerState } from "../domain/ports/GameGateway.js";
import {
  DIRECTIONS,
  SHIP_KINDS,
  isPlayerId,
  type AttackResult,
  type Cell,
  type Direction,
  type GameId,
  type Location,
  type PlayerId,
  type ShipKind,
} from "../domain/typedefs.js";
import type { LastAttack, Request, Response } from "./messages.js";

type WireObject = Readonly<Record<string, unknown>>;

const CELLS: readonly Cell[] = ["empty", "miss", "hit"];
const WIRE_ERROR_CODES: readonly WireError["code"][] = [...GAME_ERROR_CODES, "InvalidRequest"];

function isWireObject(value: unknown): value is WireObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Collects every problem in a frame instead of stopping at the first one.
 * Readers hand back a placeholder after recording an issue so decoding can go on;
 * `finish` throws before any placeholder escapes.
 */
class WireReader {
  readonly issues: string[] = [];

  fail(path: string, expected: string): void {
    this.issues.push(`${path} must be ${expected}`);
  }

  object(value: unknown, path: string): WireObject {
    if (isWireObject(value)) return value;
    this.fail(path, "an object");
    return {};
  }

  string(source: WireObject, key: string, path: string): string {
    const value = source[key];
    if (typeof value === "string") return value;
    this.fail(`${path}.${key}`, "a string");
    return "";
  }

  integer(source: WireObject, key: string, path: string, min = 0): number {
    const value = source[key];
    if (typeof value === "number" && Number.isInteger(value) && value >= min) return value;
    this.fail(`${path}.${key}`, `an integer >= ${min}`);
    return min;
  }

  gameId(source: WireObject, key: string, path: string): GameId {
    return this.integer(source, key, path, 1);
  }

  playerId(source: WireObject, key: string, path: string): PlayerId {
    const value = source[key];
    if (isPlayerId(value)) return value;
    this.fail(`${path}.${key}`, "a player id like 1.1");
    return "0.0";
  }

  oneOf<T extends string>(
    source: WireObject,
    key: string,
    path: string,
    allowed: readonly T[],
  ): T | undefined {
    const value = source[key];
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      this.fail(`${path}.${key}`, `one of ${allowed.join(", ")}`);
    }
    return match;
  }

  direction(source: WireObject, key: string, path: string): Direction {
    return this.oneOf(source, key, path, DIRECTIONS) ?? "north";
  }

  location(source: WireObject, key: string, path: string): Location {
    const inner = this.object(source[key], `${path}.${key}`);
    return {
      column: this.integer(inner, "column", `${path}.${key}`),
      row: this.integer(inner, "row", `${path}.${key}`),
    };
  }

  attackResult(source: WireObject, key: string, path: string): AttackResult {
    const innerPath = `${path}.${key}`;
    const inner = this.object(source[key], innerPath);
    const kind = this.oneOf(inner, "kind", innerPath, ["hit", "miss", "sunk"] as const);
    switch (kind) {
      case "hit":
        return { kind: "hit" };
      case "sunk":
        return { kind: "sunk", ship: this.string(inner, "ship", innerPath) };
      default:
        return { kind: "miss" };
    }
  }

  array<T>(
    source: WireObject,
    key: string,
    path: string,
    readItem: (item: unknown, itemPath: string) => T,
  ): T[] {
    const value = source[key];
    if (!Array.isArray(value)) {
      this.fail(`${path}.${key}`, "an array");
      return [];
    }
    return value.map((item: unknown, index) => readItem(item, `${path}.${key}[${index}]`));
  }

  finish(): void {
    if (this.issues.length > 0) {
      throw ProtocolError.because(this.issues);
    }
  }
}

function parseFrame(reader: WireReader, text: string): WireObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw ProtocolError.because([
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
    ]);
  }
  const frame = reader.object(parsed, "message");
  reader.finish();
  return frame;
}

// -----------------------------------------------------------------------------
//  Requests
// -----------------------------------------------------------------------------

export function decodeRequest(text: string): Request {
  const reader = new WireReader();
  const frame = parseFrame(reader, text);
  const path = "message";

  const request = ((): Request | undefined => {
    switch (frame["type"]) {
      case "CreateGame":
        return { type: "CreateGame" };
      case "AddPlayer":
        return {
          type: "AddPlayer",
          gameId: reader.gameId(frame, "gameId", path),
          name: reader.string(frame, "name", path),
        };
      case "JoinGame":
        return { type: "JoinGame", playerId: reader.playerId(frame, "playerId", path) };
      case "PlaceShip":
        return {
          type: "PlaceShip",
          playerId: reader.playerId(frame, "playerId", path),
          shipId: reader.integer(frame, "shipId", path, 1),
          location: reader.location(frame, "location", path),
          direction: reader.direction(frame, "direction", path),
        };
      case "Advance":
        return {
          type: "Advance",
          attacker: reader.playerId(frame, "attacker", path),
          target: reader.playerId(frame, "target", path),
          location: reader.location(frame, "location", path),
        };
      case "WaitForTurn":
        return { type: "WaitForTurn", playerId: reader.playerId(frame, "playerId", path) };
      case "Winner":
        return { type: "Winner", gameId: reader.gameId(frame, "gameId", path) };
      default:
        reader.issues.push(`unknown request type ${String(frame["type"])}`);
        return undefined;
    }
  })();

  reader.finish();
  if (!request) {
    throw ProtocolError.because(reader.issues);
  }
  return request;
}

export function encodeRequest(request: Request): string {
  return JSON.stringify(request);
}

// -----------------------------------------------------------------------------
//  Responses
// -----------------------------------------------------------------------------

function readField(reader: WireReader, value: unknown, path: string): FieldState {
  const source = reader.object(value, path);
  const width = reader.integer(source, "width", path, 1);
  const height = reader.integer(source, "height", path, 1);
  const cells = reader.array(source, "cells", path, (item, itemPath) => {
    const cell = CELLS.find((candidate) => candidate === item);
    if (cell === undefined) {
      reader.fail(itemPath, `one of ${CELLS.join(", ")}`);
    }
    return cell ?? "empty";
  });
  if (cells.length !== width * height) {
    reader.fail(`${path}.cells`, `${width * height} cells long`);
  }
  return { width, height, cells };
}

function readShip(reader: WireReader, value: unknown, path: string): ShipState {
  const source = reader.object(value, path);
  let placement: Placement | undefined;
  if (source["placement"] !== undefined && source["placement"] !== null) {
    const placementPath = `${path}.placement`;
    const inner = reader.object(source["placement"], placementPath);
    placement = {
      location: reader.location(inner, "location", placementPath),
      direction: reader.direction(inner, "direction", placementPath),
    };
  }
  return {
    id: reader.integer(source, "id", path, 1),
    kind: reader.oneOf(source, "kind", path, SHIP_KINDS) ?? "patrolBoat",
    hits: reader.integer(source, "hits", path),
    placement,
  };
}

function readPlayer(reader: WireReader, value: unknown, path: string): PlayerState {
  const source = reader.object(value, path);
  return {
    id: reader.playerId(source, "id", path),
    name: reader.string(source, "name", path),
    ownField: readField(reader, source["ownField"], `${path}.ownField`),
    speculativeField: readField(reader, source["speculativeField"], `${path}.speculativeField`),
    ships: reader.array(source, "ships", path, (item, itemPath) =>
      readShip(reader, item, itemPath),
    ),
  };
}

function readLastAttack(reader: WireReader, value: unknown, path: string): LastAttack | null {
  if (value === null || value === undefined) return null;
  const source = reader.object(value, path);
  return {
    location: reader.location(source, "location", path),
    result: reader.attackResult(source, "result", path),
  };
}

export function decodeResponse(text: string): Response {
  const reader = new WireReader();
  const frame = parseFrame(reader, text);
  const path = "message";

  const response = ((): Response | undefined => {
    switch (frame["type"]) {
      case "CreateGame":
        return { type: "CreateGame", gameId: reader.gameId(frame, "gameId", path) };
      case "AddPlayer": {
        const board = reader.object(frame["board"], `${path}.board`);
        return {
          type: "AddPlayer",
          playerId: reader.playerId(frame, "playerId", path),
          board: {
            width: reader.integer(board, "width", `${path}.board`, 1),
            height: reader.integer(board, "height", `${path}.board`, 1),
          },
          fleet: reader.array(frame, "fleet", path, (item, itemPath): ShipKind => {
            const kind = SHIP_KINDS.find((candidate) => candidate === item);
            if (kind === undefined) {
              reader.fail(itemPath, `one of ${SHIP_KINDS.join(", ")}`);
            }
            return kind ?? "patrolBoat";
          }),
        };
      }
      case "JoinedGame":
        return {
          type: "JoinedGame",
          playerId: reader.playerId(frame, "playerId", path),
          player: readPlayer(reader, frame["player"], `${path}.player`),
        };
      case "PlaceShip":
        return {
          type: "PlaceShip",
          shipId: reader.integer(frame, "shipId", path, 1),
          location: reader.location(frame, "location", path),
          direction: reader.direction(frame, "direction", path),
        };
      case "Advance":
        return {
          type: "Advance",
          location: reader.location(frame, "location", path),
          result: reader.attackResult(frame, "result", path),
        };
      case "WaitForTurn":
        return {
          type: "WaitForTurn",
          lastAttack: readLastAttack(reader, frame["lastAttack"], `${path}.lastAttack`),
          otherPlayers: reader.array(frame, "otherPlayers", path, (item, itemPath) => {
            if (isPlayerId(item)) return item;
            reader.fail(itemPath, "a player id like 1.1");
            return "0.0";
          }),
        };
      case "Winner": {
        const winner = frame["winner"];
        if (winner === null || winner === undefined) {
          return { type: "Winner", winner: null };
        }
        return { type: "Winner", winner: reader.playerId(frame, "winner", path) };
      }
      case "Error": {
        const error = reader.object(frame["error"], `${path}.error`);
        return {
          type: "Error",
          error: {
            code: reader.oneOf(error, "code", `${path}.error`, WIRE_ERROR_CODES) ?? "InvalidRequest",
            message: reader.string(error, "message", `${path}.error`),
          },
        };
      }
      default:
        reader.issues.push(`unknown response type ${String(frame["type"])}`);
        return undefined;
    }
  })();

  reader.finish();
  if (!response) {
    throw ProtocolError.because(reader.issues);
  }
  return response;
}

export function encodeResponse(response: Response): string {
  return JSON.stringify(response);
}
