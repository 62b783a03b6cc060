import type { createNodeWebSocket } from "@hono/node-ws";
import { Hono } from "hono";
import type { Context, Next } from "hono";
import { readFile, stat } from "node:fs/promises";
import { extname, join, normalize, sep } from "node:path";

import type { WebSocketBus } from "./adapters/WebSocketBus.js";
import type { CommandQueue } from "./CommandQueue.js";
import {
  CreateGame,
  GameCommandInputError,
  GameRuleError,
  createGameConfig,
  currentTurn,
  dispatchCommand,
  gameChannel,
  isDead,
  shipsPlaced,
  winner,
  type CommandContext,
  type GameConfig,
  type GameGateway,
  type Logger,
} from "./core.js";
import { GameSession } from "./GameSession.js";

type UpgradeWebSocket = ReturnType<typeof createNodeWebSocket>["upgradeWebSocket"];

export interface CreateServerAppOptions {
  readonly port: number;
  readonly gameGateway: GameGateway;
  readonly bus: WebSocketBus;
  readonly queue: CommandQueue;
  readonly defaultConfig: GameConfig;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  /** Enables the `/ws` routes; omitted when the app is exercised without a real server */
  readonly upgradeWebSocket?: UpgradeWebSocket;
  /** Directory holding the built browser client */
  readonly frontendDir?: string;
  /** App to register the routes on, when WebSocket support was bound to it beforehand */
  readonly app?: Hono;
}

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  ".html": "text/html; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".ico": "image/x-icon",
  ".json": "application/json",
};

export function createServerApp({
  port,
  gameGateway,
  bus,
  queue,
  defaultConfig,
  logger,
  createContext,
  upgradeWebSocket,
  frontendDir,
  app = new Hono(),
}: CreateServerAppOptions): Hono {
  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port } }),
  );

  app.post("/api/games", async (c: Context) => {
    const body = await c.req
      .json<{ readonly boardWidth?: unknown; readonly boardHeight?: unknown }>()
      .catch(() => null);

    const width = body?.boardWidth ?? defaultConfig.boardWidth;
    const height = body?.boardHeight ?? defaultConfig.boardHeight;
    if (typeof width !== "number" || typeof height !== "number") {
      return c.json({ error: "boardWidth and boardHeight must be numbers" }, 400);
    }

    try {
      const command = new CreateGame(
        createGameConfig({ ...defaultConfig, boardWidth: width, boardHeight: height }),
        Date.now(),
      );
      const context = createContext();
      const gameId = await queue.run(() => dispatchCommand(command, context));
      return c.json({ gameId }, 201);
    } catch (error) {
      if (error instanceof GameCommandInputError) {
        return c.json({ error: error.message, issues: error.issues }, 400);
      }
      logger.error("Failed to create game", { error });
      return c.json({ error: getErrorMessage(error) }, 500);
    }
  });

  app.get("/api/games/:id", async (c: Context) => {
    const raw = c.req.param("id");
    const gameId = Number(raw);
    if (!Number.isInteger(gameId) || gameId < 1) {
      return c.json({ error: "game id must be a positive integer" }, 400);
    }

    try {
      const game = await gameGateway.loadGameState(gameId);
      return c.json({
        id: game.id,
        board: { width: game.config.boardWidth, height: game.config.boardHeight },
        players: game.players.map((player) => ({
          id: player.id,
          name: player.name,
          shipsPlaced: shipsPlaced(player),
          alive: !isDead(player),
        })),
        currentTurn: currentTurn(game) ?? null,
        winner: winner(game) ?? null,
      });
    } catch (error) {
      if (error instanceof GameRuleError && error.code === "UnknownGame") {
        return c.json({ error: "Game not found" }, 404);
      }
      logger.error("Failed to load game", { gameId, error });
      return c.json({ error: getErrorMessage(error) }, 500);
    }
  });

  if (upgradeWebSocket) {
    app.get(
      "/ws",
      upgradeWebSocket(() => {
        let session: GameSession | undefined;
        return {
          onOpen(_event, ws): void {
            session = new GameSession({ socket: ws, createContext, queue, bus, logger });
            logger.info("Game client connected");
          },
          onMessage(event, ws): void {
            session ??= new GameSession({ socket: ws, createContext, queue, bus, logger });
            void session.receive(event.data);
          },
          onClose(): void {
            session?.close();
            logger.info("Game client disconnected");
          },
        };
      }),
    );

    app.get(
      "/ws/games/:id/events",
      upgradeWebSocket((c: Context) => {
        const gameId = Number(c.req.param("id"));
        return {
          onOpen(_event, ws): void {
            const rawSocket = ws.raw;
            if (!rawSocket) {
              logger.warn("WebSocket connection missing raw handle", { gameId });
              return;
            }
            bus.attach(gameChannel(gameId), rawSocket);
          },
        };
      }),
    );
  }

  if (frontendDir) {
    app.get("/*", async (c: Context): Promise<Response> => {
      const requested = c.req.path === "/" ? "/index.html" : c.req.path;
      const filePath = normalize(join(frontendDir, requested));
      if (!filePath.startsWith(normalize(frontendDir) + sep)) {
        return c.json({ error: "Not found" }, 404);
      }

      const target = (await isFile(filePath)) ? filePath : join(frontendDir, "index.html");
      if (!(await isFile(target))) {
        return c.json({ error: "Frontend build not found" }, 404);
      }

      const contents = await readFile(target);
      c.header("Content-Type", CONTENT_TYPES[extname(target)] ?? "application/octet-stream");
      return c.body(new Uint8Array(contents));
    });
  }

  return app;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
