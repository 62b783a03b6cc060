import { currentTurn, placeShip } from "../entities/GameRules.js";
import { gameChannel } from "../ports/MessageBus.js";
import { gameIdOf } from "../typedefs.js";
import type { Direction, Location, PlayerId, ShipId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export interface ShipPlacement {
  readonly shipId: ShipId;
  readonly location: Location;
  readonly direction: Direction;
}

export class PlaceShip extends Command<ShipPlacement> {
  readonly type = "PlaceShip" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly shipId: ShipId,
    public readonly location: Location,
    public readonly direction: Direction,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ gameGateway, bus, logger }: CommandContext): Promise<ShipPlacement> {
    const gameId = gameIdOf(this.playerId);
    const game = await gameGateway.loadGameState(gameId);

    const turnBefore = currentTurn(game);
    placeShip(game, this.playerId, this.shipId, this.location, this.direction);
    const turnAfter = currentTurn(game);

    await gameGateway.saveGameState(game);

    logger?.info?.("Ship placed", {
      type: this.type,
      gameId,
      playerId: this.playerId,
      shipId: this.shipId,
      at: this.at,
    });

    await bus.publish(gameChannel(gameId), {
      type: "ShipPlaced",
      gameId,
      playerId: this.playerId,
      shipId: this.shipId,
      at: this.at,
    });

    if (turnBefore === undefined && turnAfter !== undefined) {
      logger?.info?.("All fleets placed; battle begins", { gameId, firstTurn: turnAfter });
      await bus.publish(gameChannel(gameId), {
        type: "TurnChanged",
        gameId,
        playerId: turnAfter,
        at: this.at,
      });
    }

    return {
      shipId: this.shipId,
      location: this.location,
      direction: this.direction,
    };
  }
}
