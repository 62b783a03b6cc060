export type {
  Command,
  CommandContext,
} from "@battleship/core/domain/commands/Command.js";
export { AddPlayer } from "@battleship/core/domain/commands/AddPlayer.js";
export { Advance } from "@battleship/core/domain/commands/Advance.js";
export { CreateGame } from "@battleship/core/domain/commands/CreateGame.js";
export { GetWinner } from "@battleship/core/domain/commands/GetWinner.js";
export { JoinGame } from "@battleship/core/domain/commands/JoinGame.js";
export { PlaceShip } from "@battleship/core/domain/commands/PlaceShip.js";
export { WaitForTurn } from "@battleship/core/domain/commands/WaitForTurn.js";
export { dispatchCommand } from "@battleship/core/domain/commands/dispatchCommand.js";
export { currentTurn, winner } from "@battleship/core/domain/entities/GameRules.js";
export { isDead, shipsPlaced } from "@battleship/core/domain/entities/PlayerRules.js";
export {
  GameCommandInputError,
  GameRuleError,
  ProtocolError,
} from "@battleship/core/domain/errors/index.js";
export type { GameEvent } from "@battleship/core/domain/events.js";
export type { GameConfig } from "@battleship/core/domain/GameConfig.js";
export { createGameConfig } from "@battleship/core/domain/GameConfig.js";
export type { Logger } from "@battleship/core/domain/ports/Logger.js";
export type {
  EventBus,
  MessageBus,
  PublishedEvent,
} from "@battleship/core/domain/ports/MessageBus.js";
export { gameChannel } from "@battleship/core/domain/ports/MessageBus.js";
export type {
  GameGateway,
  GameState,
  PlayerState,
} from "@battleship/core/domain/ports/GameGateway.js";
export type { GameId, PlayerId, TimePoint } from "@battleship/core/domain/typedefs.js";
export { gameIdOf } from "@battleship/core/domain/typedefs.js";
export {
  decodeRequest,
  encodeResponse,
} from "@battleship/core/protocol/codec.js";
export type { Request, Response } from "@battleship/core/protocol/messages.js";
export { InMemoryGameGateway } from "@battleship/core/adapters/in-memory/InMemoryGameGateway.js";
