import { describe, expect, it } from "vitest";

import { GameClient } from "../../src/client/GameClient.js";
import { getCell, recordMiss } from "../../src/domain/entities/BattleField.js";
import { isPlaced } from "../../src/domain/entities/Fleet.js";
import { GameRuleError } from "../../src/domain/errors/GameRuleError.js";
import { DEFAULT_FLEET } from "../../src/domain/GameConfig.js";

function joinedClient(): GameClient {
  const client = new GameClient();
  client.handleResponse({ type: "CreateGame", gameId: 4 });
  client.addPlayer("  Alice ");
  client.handleResponse({
    type: "AddPlayer",
    playerId: "4.1",
    board: { width: 10, height: 10 },
    fleet: [...DEFAULT_FLEET],
  });
  return client;
}

describe("GameClient", () => {
  it("builds requests for the seat it holds", () => {
    const client = new GameClient();
    expect(client.createGame()).toEqual({ type: "CreateGame" });

    client.joinGame(4);
    expect(client.addPlayer("Alice")).toEqual({ type: "AddPlayer", gameId: 4, name: "Alice" });
    expect(client.winner()).toEqual({ type: "Winner", gameId: 4 });
    expect(() => client.waitForTurn()).toThrow(GameRuleError);
  });

  it("sets up the local player from AddPlayer", () => {
    const client = joinedClient();

    expect(client.playerId).toBe("4.1");
    expect(client.player.name).toBe("Alice");
    expect(client.player.ships).toHaveLength(5);
    expect(client.waitForTurn()).toEqual({ type: "WaitForTurn", playerId: "4.1" });
  });

  it("mirrors confirmed placements", () => {
    const client = joinedClient();
    const location = { column: 0, row: 0 };

    expect(client.placeShip(1, location, "east")).toEqual({
      type: "PlaceShip",
      playerId: "4.1",
      shipId: 1,
      location,
      direction: "east",
    });
    const event = client.handleResponse({ type: "PlaceShip", shipId: 1, location, direction: "east" });

    expect(event).toEqual({ kind: "shipPlaced", shipId: 1 });
    expect(client.player.ships.filter(isPlaced).map((ship) => ship.id)).toEqual([1]);
  });

  it("records our shots and the opponent's", () => {
    const client = joinedClient();

    const ours = client.handleResponse({
      type: "Advance",
      location: { column: 2, row: 3 },
      result: { kind: "hit" },
    });
    const theirs = client.handleResponse({
      type: "WaitForTurn",
      lastAttack: { location: { column: 5, row: 5 }, result: { kind: "miss" } },
      otherPlayers: ["4.2"],
    });

    expect(ours).toMatchObject({ kind: "attack", incoming: false });
    expect(theirs).toEqual({
      kind: "attack",
      incoming: true,
      location: { column: 5, row: 5 },
      result: { kind: "miss" },
    });
    expect(getCell(client.player.speculativeField, { column: 2, row: 3 })).toBe("hit");
    expect(getCell(client.player.ownField, { column: 5, row: 5 })).toBe("miss");
    expect(client.otherPlayerIds()).toEqual(["4.2"]);
  });

  it("takes the game id from a rejoined player", () => {
    const client = joinedClient();
    const rejoined = new GameClient();

    const event = rejoined.handleResponse({
      type: "JoinedGame",
      playerId: "4.1",
      player: client.player,
    });

    expect(event).toEqual({ kind: "joined", playerId: "4.1" });
    expect(rejoined.gameId).toBe(4);
    expect(rejoined.getPlayer("4.1").name).toBe("Alice");
    expect(() => rejoined.getPlayer("4.2")).toThrow("unknown player");
  });

  it("reports a shot the rejoined field already shows", () => {
    const player = joinedClient().player;
    recordMiss(player.ownField, { column: 5, row: 5 });
    const rejoined = new GameClient();
    rejoined.handleResponse({ type: "JoinedGame", playerId: "4.1", player });

    const event = rejoined.handleResponse({
      type: "WaitForTurn",
      lastAttack: { location: { column: 5, row: 5 }, result: { kind: "miss" } },
      otherPlayers: ["4.2"],
    });

    expect(event).toEqual({
      kind: "attack",
      incoming: true,
      location: { column: 5, row: 5 },
      result: { kind: "miss" },
    });
    expect(getCell(rejoined.player.ownField, { column: 5, row: 5 })).toBe("miss");
  });

  it("throws the server's rule error", () => {
    const client = joinedClient();

    expect(() =>
      client.handleResponse({
        type: "Error",
        error: { code: "NotYourTurn", message: "it is not Alice's turn" },
      }),
    ).toThrow("it is not Alice's turn");
  });

  it("reports the winner, or none", () => {
    const client = joinedClient();

    expect(client.handleResponse({ type: "Winner", winner: null })).toEqual({
      kind: "winner",
      winner: undefined,
    });
    expect(client.handleResponse({ type: "Winner", winner: "4.2" })).toEqual({
      kind: "winner",
      winner: "4.2",
    });
  });
});
