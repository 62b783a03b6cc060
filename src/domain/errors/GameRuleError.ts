import { formatDirection, formatLocation } from "../entities/Coordinates.js";
import type { Direction, Location, ShipId } from "../typedefs.js";

export type GameErrorCode =
  | "InvalidLocation"
  | "InvalidShipLocation"
  | "InvalidSelfAttack"
  | "UnknownShipId"
  | "ShipPlacementConflict"
  | "ShipAlreadyPlaced"
  | "UnknownPlayer"
  | "UnknownGame"
  | "NotYourTurn"
  | "TooManyPlayers"
  | "GameOver"
  | "CommunicationError";

export const GAME_ERROR_CODES: readonly GameErrorCode[] = [
  "InvalidLocation",
  "InvalidShipLocation",
  "InvalidSelfAttack",
  "UnknownShipId",
  "ShipPlacementConflict",
  "ShipAlreadyPlaced",
  "UnknownPlayer",
  "UnknownGame",
  "NotYourTurn",
  "TooManyPlayers",
  "GameOver",
  "CommunicationError",
];

/** Error shape carried by `Error` responses. */
export interface WireError {
  readonly code: GameErrorCode | "InvalidRequest";
  readonly message: string;
}

/**
 * A move or request the rules refuse. The message is what players see, so the
 * factories below own the wording.
 */
export class GameRuleError extends Error {
  constructor(
    public readonly code: GameErrorCode | "InvalidRequest",
    message: string,
  ) {
    super(message);
    this.name = "GameRuleError";
  }

  static invalidLocation(location: Location): GameRuleError {
    return new GameRuleError("InvalidLocation", `invalid location ${formatLocation(location)}`);
  }

  static invalidShipLocation(location: Location, direction: Direction): GameRuleError {
    return new GameRuleError(
      "InvalidShipLocation",
      `location ${formatLocation(location)}, ${formatDirection(direction)} places ship off map`,
    );
  }

  static invalidSelfAttack(): GameRuleError {
    return new GameRuleError("InvalidSelfAttack", "cannot attack yourself");
  }

  static unknownShipId(shipId: ShipId): GameRuleError {
    return new GameRuleError("UnknownShipId", `unknown ship id ${shipId}`);
  }

  static shipPlacementConflict(shipName: string): GameRuleError {
    return new GameRuleError(
      "ShipPlacementConflict",
      `unable to place ship, conflict with ${shipName}`,
    );
  }

  static shipAlreadyPlaced(shipId: ShipId): GameRuleError {
    return new GameRuleError("ShipAlreadyPlaced", `ship ${shipId} is already placed`);
  }

  static unknownPlayer(): GameRuleError {
    return new GameRuleError("UnknownPlayer", "unknown player");
  }

  static unknownGame(): GameRuleError {
    return new GameRuleError("UnknownGame", "unknown game");
  }

  static notYourTurn(playerName: string): GameRuleError {
    return new GameRuleError("NotYourTurn", `it is not ${playerName}'s turn`);
  }

  static tooManyPlayers(): GameRuleError {
    return new GameRuleError("TooManyPlayers", "too many players");
  }

  static gameOver(): GameRuleError {
    return new GameRuleError("GameOver", "the game is over");
  }

  static communicationError(): GameRuleError {
    return new GameRuleError("CommunicationError", "communication error");
  }

  static fromWire(error: WireError): GameRuleError {
    return new GameRuleError(error.code, error.message);
  }

  toWire(): WireError {
    return { code: this.code, message: this.message };
  }
}
