import type {
  AttackResult,
  GameId,
  Location,
  PlayerId,
  ShipId,
  TimePoint,
} from "./typedefs.js";

/** Events published on `game:<id>` as games progress. Ship positions never leave the server. */
export type GameEvent =
  | {
      readonly type: "GameCreated";
      readonly gameId: GameId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "PlayerAdded";
      readonly gameId: GameId;
      readonly playerId: PlayerId;
      readonly name: string;
      readonly at: TimePoint;
    }
  | {
      readonly type: "ShipPlaced";
      readonly gameId: GameId;
      readonly playerId: PlayerId;
      readonly shipId: ShipId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "AttackResolved";
      readonly gameId: GameId;
      readonly attacker: PlayerId;
      readonly target: PlayerId;
      readonly location: Location;
      readonly result: AttackResult;
      readonly at: TimePoint;
    }
  | {
      readonly type: "TurnChanged";
      readonly gameId: GameId;
      readonly playerId: PlayerId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "GameWon";
      readonly gameId: GameId;
      readonly winner: PlayerId;
      readonly at: TimePoint;
    };

export type GameEventType = GameEvent["type"];
