import { describe, expect, it } from "vitest";

import { createLoggerMock } from "../support/mocks.js";
import { GameConnection } from "../../src/client/GameConnection.js";

describe("GameConnection", () => {
  it("sends encoded requests and pairs responses in order", async () => {
    const sent: string[] = [];
    const connection = new GameConnection((text) => sent.push(text));

    const first = connection.request({ type: "CreateGame" });
    const second = connection.request({ type: "Winner", gameId: 1 });
    connection.receive('{"type":"CreateGame","gameId":1}');
    connection.receive('{"type":"Winner","winner":null}');

    await expect(first).resolves.toEqual({ type: "CreateGame", gameId: 1 });
    await expect(second).resolves.toEqual({ type: "Winner", winner: null });
    expect(sent).toEqual(['{"type":"CreateGame"}', '{"type":"Winner","gameId":1}']);
  });

  it("drops responses nobody asked for", () => {
    const logger = createLoggerMock();
    const connection = new GameConnection(() => undefined, logger);

    connection.receive('{"type":"CreateGame","gameId":1}');

    expect(logger.warn).toHaveBeenCalledWith("Dropping unsolicited response", {
      text: '{"type":"CreateGame","gameId":1}',
    });
  });

  it("fails the request a garbled response belongs to", async () => {
    const connection = new GameConnection(() => undefined, createLoggerMock());

    const pending = connection.request({ type: "CreateGame" });
    connection.receive("not json");

    await expect(pending).rejects.toMatchObject({ code: "CommunicationError" });
    expect(connection.outstanding).toBe(0);
  });

  it("fails outstanding and later requests once closed", async () => {
    const connection = new GameConnection(() => undefined);

    const pending = connection.request({ type: "WaitForTurn", playerId: "1.1" });
    connection.close();

    await expect(pending).rejects.toMatchObject({ code: "CommunicationError" });
    await expect(connection.request({ type: "CreateGame" })).rejects.toMatchObject({
      code: "CommunicationError",
    });
    expect(connection.closed).toBe(true);
  });

  it("fails a request the transport cannot send", async () => {
    const connection = new GameConnection(() => {
      throw new Error("socket gone");
    });

    await expect(connection.request({ type: "CreateGame" })).rejects.toMatchObject({
      code: "CommunicationError",
    });
    expect(connection.outstanding).toBe(0);
  });
});
