import { describe, expect, it } from "vitest";

import { ProtocolError } from "../src/domain/errors/ProtocolError.js";
import {
  decodeRequest,
  decodeResponse,
  encodeRequest,
  encodeResponse,
} from "../src/protocol/codec.js";

function issuesOf(action: () => unknown): readonly string[] {
  try {
    action();
  } catch (error) {
    if (error instanceof ProtocolError) return error.issues;
    throw error;
  }
  throw new Error("expected a ProtocolError");
}

describe("decodeRequest", () => {
  it("reads every request type", () => {
    expect(decodeRequest('{"type":"CreateGame"}')).toEqual({ type: "CreateGame" });
    expect(
      decodeRequest(
        '{"type":"PlaceShip","playerId":"4.2","shipId":3,"location":{"column":1,"row":2},"direction":"west"}',
      ),
    ).toEqual({
      type: "PlaceShip",
      playerId: "4.2",
      shipId: 3,
      location: { column: 1, row: 2 },
      direction: "west",
    });
    expect(decodeRequest('{"type":"Winner","gameId":4}')).toEqual({ type: "Winner", gameId: 4 });
  });

  it("lists every bad field at once", () => {
    const issues = issuesOf(() =>
      decodeRequest(
        '{"type":"Advance","attacker":"one","target":"1.2","location":{"column":-1,"row":"b"}}',
      ),
    );

    expect(issues).toEqual([
      "message.attacker must be a player id like 1.1",
      "message.location.column must be an integer >= 0",
      "message.location.row must be an integer >= 0",
    ]);
  });

  it("names the allowed directions", () => {
    expect(
      issuesOf(() =>
        decodeRequest(
          '{"type":"PlaceShip","playerId":"1.1","shipId":1,"location":{"column":0,"row":0},"direction":"up"}',
        ),
      ),
    ).toEqual(["message.direction must be one of north, south, east, west"]);
  });

  it("rejects unknown types, non-objects and broken JSON", () => {
    expect(issuesOf(() => decodeRequest('{"type":"Surrender"}'))).toEqual([
      "unknown request type Surrender",
    ]);
    expect(issuesOf(() => decodeRequest("[1,2]"))).toEqual(["message must be an object"]);
    expect(() => decodeRequest("{oops")).toThrow(/^Malformed message: invalid JSON/);
    expect(issuesOf(() => decodeRequest('{"type":"AddPlayer","gameId":0,"name":"A"}'))).toEqual([
      "message.gameId must be an integer >= 1",
    ]);
  });

  it("reads what encodeRequest writes", () => {
    const request = {
      type: "Advance",
      attacker: "2.1",
      target: "2.2",
      location: { column: 9, row: 0 },
    } as const;

    expect(decodeRequest(encodeRequest(request))).toEqual(request);
  });
});

describe("decodeResponse", () => {
  it("turns a null last attack into null", () => {
    expect(
      decodeResponse('{"type":"WaitForTurn","lastAttack":null,"otherPlayers":["1.1"]}'),
    ).toEqual({ type: "WaitForTurn", lastAttack: null, otherPlayers: ["1.1"] });
  });

  it("reads sunk results and errors", () => {
    expect(
      decodeResponse(
        encodeResponse({
          type: "Advance",
          location: { column: 1, row: 4 },
          result: { kind: "sunk", ship: "PatrolBoat" },
        }),
      ),
    ).toEqual({
      type: "Advance",
      location: { column: 1, row: 4 },
      result: { kind: "sunk", ship: "PatrolBoat" },
    });
    expect(
      decodeResponse('{"type":"Error","error":{"code":"NotYourTurn","message":"wait"}}'),
    ).toEqual({ type: "Error", error: { code: "NotYourTurn", message: "wait" } });
  });

  it("checks the full player carried by JoinedGame", () => {
    const issues = issuesOf(() =>
      decodeResponse(
        JSON.stringify({
          type: "JoinedGame",
          playerId: "1.1",
          player: {
            id: "1.1",
            name: "Alice",
            ownField: { width: 2, height: 1, cells: ["empty", "splash"] },
            speculativeField: { width: 2, height: 1, cells: ["empty"] },
            ships: [{ id: 1, kind: "patrolBoat", hits: 0 }],
          },
        }),
      ),
    );

    expect(issues).toEqual([
      "message.player.ownField.cells[1] must be one of empty, miss, hit",
      "message.player.speculativeField.cells must be 2 cells long",
    ]);
  });

  it("rejects unknown error codes", () => {
    expect(
      issuesOf(() => decodeResponse('{"type":"Error","error":{"code":"Oops","message":"x"}}')),
    ).toHaveLength(1);
  });
});
