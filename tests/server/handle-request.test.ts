import { describe, expect, it } from "vitest";

import { createTestContext, type ServerTestContext } from "./support/testContext.js";
import { createCommandContext, createLoggerMock } from "../support/mocks.js";
import { CommandQueue } from "../../packages/server/src/CommandQueue.js";
import { handleRequest } from "../../packages/server/src/handleRequest.js";
import type { Request, Response } from "../../src/protocol/messages.js";

function sender(context: ServerTestContext, signal?: AbortSignal) {
  return (request: Request): Promise<Response> =>
    handleRequest(request, context.createContext(), {
      queue: context.queue,
      bus: context.bus,
      signal,
      now: () => 1_000,
    });
}

async function setUpBattle(context: ServerTestContext): Promise<void> {
  const send = sender(context);
  await send({ type: "CreateGame" });
  await send({ type: "AddPlayer", gameId: 1, name: "Alice" });
  await send({ type: "AddPlayer", gameId: 1, name: "Bob" });
  for (const playerId of ["1.1", "1.2"]) {
    for (let shipId = 1; shipId <= 5; shipId += 1) {
      await send({
        type: "PlaceShip",
        playerId,
        shipId,
        location: { column: 0, row: shipId - 1 },
        direction: "east",
      });
    }
  }
}

const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe("handleRequest", () => {
  it("answers each request with its response", async () => {
    const context = createTestContext();
    const send = sender(context);

    await expect(send({ type: "CreateGame" })).resolves.toEqual({ type: "CreateGame", gameId: 1 });
    await expect(send({ type: "AddPlayer", gameId: 1, name: "Alice" })).resolves.toEqual({
      type: "AddPlayer",
      playerId: "1.1",
      board: { width: 10, height: 10 },
      fleet: ["carrier", "battleship", "destroyer", "submarine", "patrolBoat"],
    });
    await expect(send({ type: "Winner", gameId: 1 })).resolves.toEqual({
      type: "Winner",
      winner: null,
    });
  });

  it("turns rule and input failures into error responses", async () => {
    const context = createTestContext();
    const send = sender(context);

    await expect(send({ type: "AddPlayer", gameId: 9, name: "Alice" })).resolves.toEqual({
      type: "Error",
      error: { code: "UnknownGame", message: "unknown game" },
    });
    await expect(send({ type: "AddPlayer", gameId: 9, name: " " })).resolves.toEqual({
      type: "Error",
      error: { code: "InvalidRequest", message: "Player name must not be empty" },
    });
  });

  it("reports unexpected failures as communication errors", async () => {
    const logger = createLoggerMock();
    const ctx = createCommandContext({ logger });
    const failure = new Error("disk on fire");
    ctx.gameGateway.loadGameState.mockRejectedValue(failure);

    const response = await handleRequest({ type: "Winner", gameId: 1 }, ctx, {
      queue: new CommandQueue(),
      bus: createTestContext().bus,
    });

    expect(response).toEqual({
      type: "Error",
      error: { code: "CommunicationError", message: "communication error" },
    });
    expect(logger.error).toHaveBeenCalledWith("Request failed", { type: "Winner", error: failure });
  });

  it("parks WaitForTurn until the opponent has moved", async () => {
    const context = createTestContext();
    await setUpBattle(context);
    const send = sender(context);

    const waiting = send({ type: "WaitForTurn", playerId: "1.1" });
    await flush();
    expect(context.bus.waiting).toBe(1);

    await expect(
      send({ type: "Advance", attacker: "1.2", target: "1.1", location: { column: 9, row: 9 } }),
    ).resolves.toEqual({
      type: "Advance",
      location: { column: 9, row: 9 },
      result: { kind: "miss" },
    });

    await expect(waiting).resolves.toEqual({
      type: "WaitForTurn",
      lastAttack: { location: { column: 9, row: 9 }, result: { kind: "miss" } },
      otherPlayers: ["1.2"],
    });
    expect(context.bus.waiting).toBe(0);
  });

  it("answers at once when the turn is already there", async () => {
    const context = createTestContext();
    await setUpBattle(context);

    await expect(sender(context)({ type: "WaitForTurn", playerId: "1.2" })).resolves.toEqual({
      type: "WaitForTurn",
      lastAttack: null,
      otherPlayers: ["1.1"],
    });
  });

  it("gives up a parked wait when the connection goes away", async () => {
    const context = createTestContext();
    await setUpBattle(context);
    const controller = new AbortController();

    const waiting = sender(context, controller.signal)({ type: "WaitForTurn", playerId: "1.1" });
    await flush();
    controller.abort();

    await expect(waiting).resolves.toEqual({
      type: "Error",
      error: { code: "CommunicationError", message: "communication error" },
    });
    expect(context.bus.waiting).toBe(0);
    expect(context.logger.debug).toHaveBeenCalledWith("Wait abandoned", { type: "WaitForTurn" });
  });
});
