import { vi, type Mock } from "vitest";

import type { CommandContext } from "../../src/domain/commands/Command.js";
import { addPlayer, createGameState } from "../../src/domain/entities/GameRules.js";
import { placeShip } from "../../src/domain/entities/PlayerRules.js";
import { createGameConfig, type GameConfig } from "../../src/domain/GameConfig.js";
import type { GameGateway, GameState } from "../../src/domain/ports/GameGateway.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { MessageBus } from "../../src/domain/ports/MessageBus.js";
import type { GameId } from "../../src/domain/typedefs.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
function createMock<T extends (...args: any[]) => unknown>(): Fn<T> {
  return vi.fn<T>();
}

export interface GameGatewayMock extends GameGateway {
  readonly loadGameState: Fn<GameGateway["loadGameState"]>;
  readonly saveGameState: Fn<GameGateway["saveGameState"]>;
  readonly createGame: Fn<GameGateway["createGame"]>;
}

export interface MessageBusMock extends MessageBus {
  readonly publish: Fn<MessageBus["publish"]>;
}

export interface LoggerMock extends Logger {
  readonly info: Fn<Logger["info"]>;
  readonly warn: Fn<Logger["warn"]>;
  readonly error: Fn<Logger["error"]>;
  readonly debug: Fn<Logger["debug"]>;
}

export function createGameGatewayMock(): GameGatewayMock {
  return {
    loadGameState: createMock<GameGateway["loadGameState"]>(),
    saveGameState: createMock<GameGateway["saveGameState"]>(),
    createGame: createMock<GameGateway["createGame"]>(),
  };
}

export function createMessageBusMock(): MessageBusMock {
  return {
    publish: createMock<MessageBus["publish"]>(),
  };
}

export function createLoggerMock(): LoggerMock {
  return {
    info: createMock<Logger["info"]>(),
    warn: createMock<Logger["warn"]>(),
    error: createMock<Logger["error"]>(),
    debug: createMock<Logger["debug"]>(),
  };
}

export interface CommandContextOverrides {
  readonly gameGateway?: GameGatewayMock;
  readonly bus?: MessageBusMock;
  readonly config?: GameConfig;
  readonly logger?: CommandContext["logger"];
}

export interface CommandContextMock extends CommandContext {
  readonly gameGateway: GameGatewayMock;
  readonly bus: MessageBusMock;
  readonly config: GameConfig;
}

export function createCommandContext(
  overrides: CommandContextOverrides = {},
): CommandContextMock {
  const context = {
    gameGateway: overrides.gameGateway ?? createGameGatewayMock(),
    bus: overrides.bus ?? createMessageBusMock(),
    config: overrides.config ?? createGameConfig(),
    ...(overrides.logger !== undefined ? { logger: overrides.logger } : {}),
  } satisfies CommandContextMock;

  return context;
}

/**
 * A two-player game: "Alice" joins as `<id>.1`, "Bob" as `<id>.2`, so Bob holds
 * the first turn. With `placed`, both fleets lie the same way: ship k starts at
 * column 0 of row k-1, facing east.
 */
export function createTestGame(
  options: { readonly id?: GameId; readonly config?: GameConfig; readonly placed?: boolean } = {},
): GameState {
  const config = options.config ?? createGameConfig();
  const game = createGameState(options.id ?? 1, config, 0);
  addPlayer(game, "Alice");
  addPlayer(game, "Bob");

  if (options.placed) {
    for (const player of game.players) {
      for (const ship of player.ships) {
        placeShip(player, ship.id, { column: 0, row: ship.id - 1 }, "east");
      }
    }
  }
  return game;
}

export function cloneState<T>(value: T): T {
  return structuredClone(value);
}
