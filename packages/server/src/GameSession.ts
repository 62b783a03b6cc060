import type { CommandQueue } from "./CommandQueue.js";
import {
  ProtocolError,
  decodeRequest,
  encodeResponse,
  type CommandContext,
  type EventBus,
  type Logger,
  type Request,
} from "./core.js";
import { handleRequest } from "./handleRequest.js";

/** WebSocket close code for a frame the server cannot accept */
export const UNSUPPORTED_DATA = 1003;

/** The part of a socket (raw `ws` or hono's `WSContext`) a session writes to. */
export interface SessionSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type FrameData = string | Blob | ArrayBufferLike | ArrayBufferView;

export interface GameSessionOptions {
  readonly socket: SessionSocket;
  readonly createContext: () => CommandContext;
  readonly queue: CommandQueue;
  readonly bus: EventBus;
  readonly logger: Logger;
}

/**
 * One client connection speaking the game protocol. Frames are answered one
 * at a time in arrival order, so a parked `WaitForTurn` holds back later frames
 * from the same connection.
 */
export class GameSession {
  readonly #options: GameSessionOptions;
  readonly #abort = new AbortController();
  #chain: Promise<void> = Promise.resolve();
  #closed = false;

  constructor(options: GameSessionOptions) {
    this.#options = options;
  }

  /** Queues a received frame; the returned promise settles once it has been answered. */
  receive(data: FrameData): Promise<void> {
    const next = this.#chain.then(() => this.#handleFrame(data));
    this.#chain = next.catch((error: unknown) => {
      this.#options.logger.error("Session failed", { error });
      this.#options.socket.close();
      this.close();
    });
    return this.#chain;
  }

  /** Called when the socket closes; parked waits are abandoned. */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#abort.abort();
  }

  get closed(): boolean {
    return this.#closed;
  }

  async #handleFrame(data: FrameData): Promise<void> {
    if (this.#closed) return;

    const { logger } = this.#options;
    const text = await frameText(data);

    const request = this.#decode(text);
    if (!request) {
      return;
    }

    const response = await handleRequest(request, this.#options.createContext(), {
      queue: this.#options.queue,
      bus: this.#options.bus,
      signal: this.#abort.signal,
    });

    if (this.#closed) return;
    try {
      this.#options.socket.send(encodeResponse(response));
    } catch (error) {
      logger.warn("Failed to send response", { type: response.type, error });
    }
  }

  #decode(text: string): Request | undefined {
    try {
      return decodeRequest(text);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.#options.logger.warn("Rejected frame", { issues: error.issues });
      this.#options.socket.close(UNSUPPORTED_DATA, error.message.slice(0, 120));
      this.close();
      return undefined;
    }
  }
}

async function frameText(data: FrameData): Promise<string> {
  if (typeof data === "string") return data;
  if (data instanceof Blob) return data.text();
  return new TextDecoder().decode(ArrayBuffer.isView(data) ? data : new Uint8Array(data));
}
