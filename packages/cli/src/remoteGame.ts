import { GameConnection } from "@battleship/core/client/GameConnection.js";
import { RemoteGame } from "@battleship/core/client/RemoteGame.js";
import { describeAttack } from "@battleship/core/domain/entities/Fleet.js";
import { GameRuleError } from "@battleship/core/domain/errors/GameRuleError.js";
import type { Logger } from "@battleship/core/domain/ports/Logger.js";
import type { GameId, PlayerId } from "@battleship/core/domain/typedefs.js";
import WebSocket from "ws";

import { attack, placeShips, printBoards } from "./playbook.js";
import { ask, type Prompter } from "./prompter.js";

export interface OpenConnection {
  readonly connection: GameConnection;
  close(): void;
}

export type Connect = (url: string) => Promise<OpenConnection>;

/** Opens a `ws` socket to the server's `/ws` endpoint and wraps it in a {@link GameConnection}. */
export function connectWebSocket(logger?: Logger): Connect {
  return (url) =>
    new Promise<OpenConnection>((resolve, reject) => {
      const socket = new WebSocket(url);
      const connection = new GameConnection((text) => socket.send(text), logger);

      socket.on("message", (data: WebSocket.RawData) => {
        connection.receive(data.toString());
      });
      socket.on("close", (code: number) => {
        logger?.debug?.("Connection closed", { code });
        connection.close();
      });
      socket.once("error", reject);
      socket.once("open", () => {
        socket.off("error", reject);
        socket.on("error", (error: Error) => logger?.warn?.("Connection error", { error }));
        resolve({ connection, close: () => socket.close() });
      });
    });
}

export interface RemoteGameOptions {
  readonly url: string;
  readonly gameId?: GameId;
  readonly connect: Connect;
}

export async function runRemoteGame(
  prompter: Prompter,
  { url, gameId, connect }: RemoteGameOptions,
): Promise<void> {
  const { connection, close } = await connect(url);
  try {
    const name = await ask(prompter, "name: ", (line) => {
      const trimmed = line.trim();
      if (trimmed.length === 0) throw new Error("name must not be empty");
      return trimmed;
    });
    const game = await RemoteGame.join(connection, name, gameId);
    prompter.print(`game ${game.gameId}`);

    const playerId = game.playerId;
    await placeShips(prompter, game, playerId);
    printBoards(prompter, game, playerId);

    await waitForTurn(prompter, game, playerId);
    const [opponent] = game.otherPlayerIds();
    if (opponent === undefined) {
      throw GameRuleError.communicationError();
    }

    let winner = await game.winner();
    while (winner === undefined) {
      await attack(prompter, game, playerId, opponent);

      winner = await game.winner();
      if (winner !== undefined) break;

      printBoards(prompter, game, playerId);
      await waitForTurn(prompter, game, playerId);
      winner = await game.winner();
    }

    prompter.print(winner === playerId ? "you win" : "you lose");
  } finally {
    close();
  }
}

async function waitForTurn(prompter: Prompter, game: RemoteGame, playerId: PlayerId): Promise<void> {
  prompter.print("waiting for other player");
  const result = await game.waitForTurn();
  if (result) {
    prompter.print(describeAttack(result));
  }
  printBoards(prompter, game, playerId);
}
