import { describe, expect, it, vi, type Mock } from "vitest";

import { createLoggerMock } from "../support/mocks.js";
import {
  WaitAbortedError,
  WebSocketBus,
  type BusSocket,
} from "../../packages/server/src/adapters/WebSocketBus.js";
import type { GameEvent } from "../../src/domain/events.js";

interface FakeSocket extends BusSocket {
  readonly send: Mock<(data: string) => void>;
  emit(event: "close" | "error", error?: Error): void;
}

function createFakeSocket(): FakeSocket {
  const handlers = new Map<string, Array<(error: Error) => void>>();

  const socket: FakeSocket = {
    send: vi.fn<(data: string) => void>(),
    on(event: "close" | "error", listener: (error: Error) => void): FakeSocket {
      handlers.set(event, [...(handlers.get(event) ?? []), listener]);
      return socket;
    },
    emit(event, error = new Error("socket error")): void {
      for (const handler of handlers.get(event) ?? []) {
        handler(error);
      }
    },
  };
  return socket;
}

const turnChanged = (playerId: string): GameEvent => ({
  type: "TurnChanged",
  gameId: 1,
  playerId,
  at: 0,
});

describe("WebSocketBus", () => {
  it("delivers published events to attached sockets", async () => {
    const bus = new WebSocketBus();
    const clientA = createFakeSocket();
    const clientB = createFakeSocket();
    const elsewhere = createFakeSocket();

    bus.attach("game:1", clientA);
    bus.attach("game:1", clientB);
    bus.attach("game:2", elsewhere);

    await bus.publish("game:1", turnChanged("1.1"));

    const frame = JSON.stringify(turnChanged("1.1"));
    expect(clientA.send).toHaveBeenCalledWith(frame);
    expect(clientB.send).toHaveBeenCalledWith(frame);
    expect(elsewhere.send).not.toHaveBeenCalled();
  });

  it("stops delivering to closed sockets", async () => {
    const bus = new WebSocketBus();
    const client = createFakeSocket();
    bus.attach("game:1", client);

    client.emit("close");
    await bus.publish("game:1", turnChanged("1.1"));

    expect(client.send).not.toHaveBeenCalled();
  });

  it("logs sockets that fail to send and carries on", async () => {
    const logger = createLoggerMock();
    const bus = new WebSocketBus(logger);
    const broken = createFakeSocket();
    const healthy = createFakeSocket();
    broken.send.mockImplementation(() => {
      throw new Error("closed");
    });
    bus.attach("game:1", broken);
    bus.attach("game:1", healthy);

    await bus.publish("game:1", turnChanged("1.1"));

    expect(healthy.send).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Failed to deliver event",
      expect.objectContaining({ channel: "game:1" }),
    );
  });

  it("resolves waiters on the first matching event", async () => {
    const bus = new WebSocketBus();

    const waiting = bus.waitFor(
      ({ event }) => event.type === "TurnChanged" && event.playerId === "1.2",
    );
    await bus.publish("game:1", turnChanged("1.1"));
    await bus.publish("game:1", turnChanged("1.2"));

    await expect(waiting).resolves.toEqual({ channel: "game:1", event: turnChanged("1.2") });
    expect(bus.waiting).toBe(0);
  });

  it("times out waiters that see nothing", async () => {
    const bus = new WebSocketBus();

    await expect(bus.waitFor(() => true, 5)).rejects.toThrow("Timed out waiting for event");
    expect(bus.waiting).toBe(0);
  });

  it("rejects and forgets waiters whose signal aborts", async () => {
    const bus = new WebSocketBus();
    const controller = new AbortController();

    const waiting = bus.waitFor(() => true, 0, controller.signal);
    expect(bus.waiting).toBe(1);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(WaitAbortedError);
    expect(bus.waiting).toBe(0);
    await expect(bus.waitFor(() => true, 0, controller.signal)).rejects.toThrow(
      "Stopped waiting for event",
    );
  });
});
