import type { WireError } from "../domain/errors/GameRuleError.js";
import type { PlayerState } from "../domain/ports/GameGateway.js";
import type {
  AttackResult,
  Direction,
  GameId,
  Location,
  PlayerId,
  ShipId,
  ShipKind,
} from "../domain/typedefs.js";

/** Messages a client sends; each one gets exactly one {@link Response}. */
export type Request =
  | { readonly type: "CreateGame" }
  | { readonly type: "AddPlayer"; readonly gameId: GameId; readonly name: string }
  | { readonly type: "JoinGame"; readonly playerId: PlayerId }
  | {
      readonly type: "PlaceShip";
      readonly playerId: PlayerId;
      readonly shipId: ShipId;
      readonly location: Location;
      readonly direction: Direction;
    }
  | {
      readonly type: "Advance";
      readonly attacker: PlayerId;
      readonly target: PlayerId;
      readonly location: Location;
    }
  | { readonly type: "WaitForTurn"; readonly playerId: PlayerId }
  | { readonly type: "Winner"; readonly gameId: GameId };

export type RequestType = Request["type"];

export interface LastAttack {
  readonly location: Location;
  readonly result: AttackResult;
}

export type Response =
  | { readonly type: "CreateGame"; readonly gameId: GameId }
  | {
      readonly type: "AddPlayer";
      readonly playerId: PlayerId;
      readonly board: { readonly width: number; readonly height: number };
      readonly fleet: readonly ShipKind[];
    }
  | { readonly type: "JoinedGame"; readonly playerId: PlayerId; readonly player: PlayerState }
  | {
      readonly type: "PlaceShip";
      readonly shipId: ShipId;
      readonly location: Location;
      readonly direction: Direction;
    }
  | { readonly type: "Advance"; readonly location: Location; readonly result: AttackResult }
  | {
      readonly type: "WaitForTurn";
      readonly lastAttack: LastAttack | null;
      readonly otherPlayers: readonly PlayerId[];
    }
  | { readonly type: "Winner"; readonly winner: PlayerId | null }
  | { readonly type: "Error"; readonly error: WireError };

export type ResponseType = Response["type"];

export type ResponseOf<T extends ResponseType> = Extract<Response, { readonly type: T }>;
