/* eslint-disable functional/immutable-data */
import { GameRuleError } from "../domain/errors/GameRuleError.js";
import { ProtocolError } from "../domain/errors/ProtocolError.js";
import type { Logger } from "../domain/ports/Logger.js";
import { decodeResponse, encodeRequest } from "../protocol/codec.js";
import type { Request, Response } from "../protocol/messages.js";

type Pending = {
  readonly request: Request;
  readonly resolve: (response: Response) => void;
  readonly reject: (error: Error) => void;
};

/**
 * Pairs requests with responses over any ordered text transport. The server
 * answers each frame exactly once and in order, so the oldest outstanding
 * request owns the next response.
 */
export class GameConnection {
  readonly #send: (text: string) => void;
  readonly #logger: Logger | undefined;
  readonly #pending: Pending[] = [];
  #closed = false;

  constructor(send: (text: string) => void, logger?: Logger) {
    this.#send = send;
    this.#logger = logger;
  }

  request(request: Request): Promise<Response> {
    if (this.#closed) {
      return Promise.reject(GameRuleError.communicationError());
    }

    return new Promise<Response>((resolve, reject) => {
      this.#pending.push({ request, resolve, reject });
      try {
        this.#send(encodeRequest(request));
      } catch (error) {
        this.#logger?.warn?.("Failed to send request", { type: request.type, error });
        this.#pending.pop();
        reject(GameRuleError.communicationError());
      }
    });
  }

  /** Feed one text frame received from the server. */
  receive(text: string): void {
    const pending = this.#pending.shift();
    if (!pending) {
      this.#logger?.warn?.("Dropping unsolicited response", { text });
      return;
    }

    let response: Response;
    try {
      response = decodeResponse(text);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.#logger?.error?.("Undecodable response", { type: pending.request.type, issues: error.issues });
      pending.reject(GameRuleError.communicationError());
      return;
    }

    pending.resolve(response);
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    const abandoned = this.#pending.splice(0);
    for (const pending of abandoned) {
      pending.reject(GameRuleError.communicationError());
    }
    if (abandoned.length > 0) {
      this.#logger?.info?.("Connection closed with requests outstanding", {
        count: abandoned.length,
      });
    }
  }

  get closed(): boolean {
    return this.#closed;
  }

  get outstanding(): number {
    return this.#pending.length;
  }
}
