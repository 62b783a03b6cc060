import type { PlayerState } from "../domain/ports/GameGateway.js";
import type { AttackResult, Direction, Location, PlayerId, ShipId } from "../domain/typedefs.js";

/** What a front end needs to drive a game, whether it runs in process or over the wire. */
export interface Play {
  placeShip(
    playerId: PlayerId,
    shipId: ShipId,
    location: Location,
    direction: Direction,
  ): Promise<void>;
  advance(attacker: PlayerId, target: PlayerId, location: Location): Promise<AttackResult>;
  getPlayer(playerId: PlayerId): PlayerState;
}
