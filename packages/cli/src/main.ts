#!/usr/bin/env tsx
/**
 * Terminal front end.
 *
 * Usage:
 *   battleship                      play against the computer
 *   battleship server [port]        host games over WebSocket
 *   battleship client <url> [game]  join a hosted game (creates one without [game])
 */
import { createConsoleLogger, loadServerConfig, startServer } from "@battleship/server";

import { parseArgs } from "./args.js";
import { runLocalGame } from "./localGame.js";
import { InputClosedError, createTerminalPrompter, errorMessage } from "./prompter.js";
import { connectWebSocket, runRemoteGame } from "./remoteGame.js";

async function main(args: readonly string[]): Promise<void> {
  const logger = createConsoleLogger("cli");
  const command = parseArgs(args);

  switch (command.kind) {
    case "invalid":
      process.stdout.write(`${command.message}\n`);
      process.exitCode = 2;
      return;

    case "server": {
      const env = command.port === undefined ? process.env : { ...process.env, PORT: command.port };
      await startServer(loadServerConfig(env));
      return;
    }

    case "local":
    case "client": {
      const prompter = createTerminalPrompter();
      try {
        if (command.kind === "local") {
          await runLocalGame(prompter);
        } else {
          await runRemoteGame(prompter, {
            url: command.url,
            connect: connectWebSocket(logger),
            ...(command.gameId === undefined ? {} : { gameId: command.gameId }),
          });
        }
      } catch (error) {
        // end of input quits the game
        if (!(error instanceof InputClosedError)) throw error;
      } finally {
        prompter.close();
      }
      return;
    }
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  process.stderr.write(`error: ${errorMessage(error)}\n`);
  process.exit(1);
});
