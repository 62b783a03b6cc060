import { WaitAbortedError } from "./adapters/WebSocketBus.js";
import type { CommandQueue } from "./CommandQueue.js";
import {
  AddPlayer,
  Advance,
  CreateGame,
  GameCommandInputError,
  GameRuleError,
  GetWinner,
  JoinGame,
  PlaceShip,
  WaitForTurn,
  dispatchCommand,
  gameChannel,
  gameIdOf,
  type CommandContext,
  type EventBus,
  type PlayerId,
  type PublishedEvent,
  type Request,
  type Response,
} from "./core.js";

export interface HandleRequestOptions {
  readonly queue: CommandQueue;
  readonly bus: EventBus;
  /** Aborted when the requesting connection goes away */
  readonly signal?: AbortSignal;
  readonly now?: () => number;
}

type WaitStep =
  | { readonly ready: true; readonly response: Response }
  | { readonly ready: false; readonly turnChanged: Promise<PublishedEvent> };

/**
 * Executes one protocol request and always produces a response. Rule and input
 * failures become `Error` responses carrying their code; anything else is
 * logged and reported as a communication error.
 */
export async function handleRequest(
  request: Request,
  ctx: CommandContext,
  options: HandleRequestOptions,
): Promise<Response> {
  const now = options.now ?? Date.now;

  try {
    if (request.type === "WaitForTurn") {
      return await waitForTurn(request.playerId, ctx, options, now);
    }
    return await options.queue.run(() => execute(request, ctx, now()));
  } catch (error) {
    return toErrorResponse(error, request, ctx);
  }
}

async function execute(
  request: Exclude<Request, { type: "WaitForTurn" }>,
  ctx: CommandContext,
  at: number,
): Promise<Response> {
  switch (request.type) {
    case "CreateGame": {
      const gameId = await dispatchCommand(new CreateGame(ctx.config, at), ctx);
      return { type: "CreateGame", gameId };
    }
    case "AddPlayer": {
      const added = await dispatchCommand(new AddPlayer(request.gameId, request.name, at), ctx);
      return { type: "AddPlayer", ...added };
    }
    case "JoinGame": {
      const player = await dispatchCommand(new JoinGame(request.playerId, at), ctx);
      return { type: "JoinedGame", playerId: request.playerId, player };
    }
    case "PlaceShip": {
      const placement = await dispatchCommand(
        new PlaceShip(request.playerId, request.shipId, request.location, request.direction, at),
        ctx,
      );
      return { type: "PlaceShip", ...placement };
    }
    case "Advance": {
      const result = await dispatchCommand(
        new Advance(request.attacker, request.target, request.location, at),
        ctx,
      );
      return { type: "Advance", location: request.location, result };
    }
    case "Winner": {
      const winner = await dispatchCommand(new GetWinner(request.gameId, at), ctx);
      return { type: "Winner", winner: winner ?? null };
    }
  }
}

/**
 * Checks the turn inside the queue and, when it is not ready, registers for the
 * player's `TurnChanged` before leaving it, so no turn change can slip between
 * the check and the subscription.
 */
async function waitForTurn(
  playerId: PlayerId,
  ctx: CommandContext,
  options: HandleRequestOptions,
  now: () => number,
): Promise<Response> {
  const channel = gameChannel(gameIdOf(playerId));

  for (;;) {
    const step = await options.queue.run(async (): Promise<WaitStep> => {
      const notice = await dispatchCommand(new WaitForTurn(playerId, now()), ctx);
      if (notice) {
        return {
          ready: true,
          response: {
            type: "WaitForTurn",
            lastAttack: notice.lastAttack ?? null,
            otherPlayers: notice.otherPlayers,
          },
        };
      }

      const turnChanged = options.bus.waitFor(
        ({ channel: published, event }) =>
          published === channel && event.type === "TurnChanged" && event.playerId === playerId,
        0,
        options.signal,
      );
      return { ready: false, turnChanged };
    });

    if (step.ready) {
      return step.response;
    }

    ctx.logger?.debug?.("Parked until turn", { playerId });
    await step.turnChanged;
  }
}

function toErrorResponse(error: unknown, request: Request, ctx: CommandContext): Response {
  if (error instanceof GameRuleError || error instanceof GameCommandInputError) {
    return { type: "Error", error: error.toWire() };
  }

  if (error instanceof WaitAbortedError) {
    ctx.logger?.debug?.("Wait abandoned", { type: request.type });
  } else {
    ctx.logger?.error?.("Request failed", { type: request.type, error });
  }
  return { type: "Error", error: GameRuleError.communicationError().toWire() };
}
