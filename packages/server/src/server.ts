import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import { Hono } from "hono";
import { existsSync } from "node:fs";
import type { AddressInfo } from "node:net";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createServerApp } from "./app.js";
import { CommandQueue } from "./CommandQueue.js";
import type { ServerConfig } from "./config.js";
import { InMemoryGameGateway } from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";

export interface RunningServer {
  readonly address: AddressInfo;
  close(): Promise<void>;
}

export async function startServer(config: ServerConfig): Promise<RunningServer> {
  const logger = createConsoleLogger("server", config.debug);
  const gameGateway = new InMemoryGameGateway();
  const bus = new WebSocketBus(logger);
  const queue = new CommandQueue();

  const createContext = (): CommandContext => ({
    gameGateway,
    bus,
    config: config.game,
    logger,
  });

  const app = new Hono();
  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });
  createServerApp({
    app,
    port: config.port,
    gameGateway,
    bus,
    queue,
    defaultConfig: config.game,
    logger,
    createContext,
    upgradeWebSocket,
    frontendDir: resolveFrontendPath(),
  });

  return new Promise<RunningServer>((resolve) => {
    const server = serve(
      { fetch: app.fetch, port: config.port, hostname: config.host },
      (address: AddressInfo) => {
        logger.info("Server listening", address);
        resolve({
          address,
          close: () =>
            new Promise<void>((done, fail) => {
              server.close((error) => (error ? fail(error) : done()));
            }),
        });
      },
    );
    injectWebSocket(server);
  });
}

function resolveFrontendPath(): string | undefined {
  const current = fileURLToPath(new URL(".", import.meta.url));
  const candidate = join(current, "../../frontend/dist");
  if (existsSync(candidate)) {
    return candidate;
  }
  return undefined;
}
