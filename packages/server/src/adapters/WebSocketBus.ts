/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { EventBus, GameEvent, Logger, PublishedEvent } from "../core.js";

/** The part of a `ws` socket the bus talks to. */
export interface BusSocket {
  send(data: string): void;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

type Listener = {
  readonly predicate: (payload: PublishedEvent) => boolean;
  readonly resolve: (payload: PublishedEvent) => void;
  readonly reject: (error: Error) => void;
  timeout?: ReturnType<typeof setTimeout>;
  detach?: () => void;
};

export class WaitAbortedError extends Error {
  constructor() {
    super("Stopped waiting for event");
    this.name = "WaitAbortedError";
  }
}

export class WebSocketBus implements EventBus {
  #clients: Map<string, Set<BusSocket>> = new Map();
  #listeners: Set<Listener> = new Set();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(channel: string, event: GameEvent): Promise<void> {
    const payload: PublishedEvent = { channel, event };
    const connections = this.#clients.get(channel);

    if (connections) {
      const message = JSON.stringify(event);
      for (const socket of connections) {
        try {
          socket.send(message);
        } catch (error) {
          this.#logger?.warn?.("Failed to deliver event", {
            channel,
            error,
          });
        }
      }
    }

    const matchedListeners: Listener[] = [];
    for (const listener of this.#listeners) {
      if (listener.predicate(payload)) {
        matchedListeners.push(listener);
      }
    }

    for (const listener of matchedListeners) {
      this.#forget(listener);
      listener.resolve(payload);
    }

    this.#logger?.debug?.("Event published", { channel, event });
  }

  attach(channel: string, socket: BusSocket): void {
    let connections = this.#clients.get(channel);
    if (!connections) {
      connections = new Set<BusSocket>();
      this.#clients.set(channel, connections);
    }
    connections.add(socket);

    this.#logger?.info?.("WebSocket client attached", {
      channel,
      size: connections.size,
    });

    socket.on("close", () => {
      const currentConnections = this.#clients.get(channel);
      if (!currentConnections) {
        return;
      }
      currentConnections.delete(socket);
      if (currentConnections.size === 0) {
        this.#clients.delete(channel);
      }
      this.#logger?.info?.("WebSocket client disconnected", {
        channel,
        size: currentConnections.size,
      });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn?.("WebSocket client error", { channel, error });
    });
  }

  waitFor(
    predicate: Listener["predicate"],
    timeoutMs = 5000,
    signal?: AbortSignal,
  ): Promise<PublishedEvent> {
    return new Promise<PublishedEvent>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new WaitAbortedError());
        return;
      }

      const listener: Listener = { predicate, resolve, reject };

      if (timeoutMs > 0) {
        listener.timeout = setTimeout(() => {
          this.#forget(listener);
          reject(new Error("Timed out waiting for event"));
        }, timeoutMs);
      }

      if (signal) {
        const onAbort = (): void => {
          this.#forget(listener);
          reject(new WaitAbortedError());
        };
        signal.addEventListener("abort", onAbort, { once: true });
        listener.detach = () => signal.removeEventListener("abort", onAbort);
      }

      this.#listeners.add(listener);
    });
  }

  get waiting(): number {
    return this.#listeners.size;
  }

  #forget(listener: Listener): void {
    if (listener.timeout) {
      clearTimeout(listener.timeout);
    }
    listener.detach?.();
    this.#listeners.delete(listener);
  }
}
