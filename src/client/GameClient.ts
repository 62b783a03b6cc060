/* eslint-disable functional/immutable-data */
import { getCell, recordHit, recordMiss } from "../domain/entities/BattleField.js";
import { isHit } from "../domain/entities/Fleet.js";
import { createPlayer, placeShip } from "../domain/entities/PlayerRules.js";
import { GameRuleError } from "../domain/errors/GameRuleError.js";
import { createGameConfig } from "../domain/GameConfig.js";
import type { PlayerState } from "../domain/ports/GameGateway.js";
import { gameIdOf } from "../domain/typedefs.js";
import type {
  AttackResult,
  Direction,
  GameId,
  Location,
  PlayerId,
  ShipId,
} from "../domain/typedefs.js";
import type { Request, Response } from "../protocol/messages.js";

export type ClientEvent =
  | { readonly kind: "none" }
  | {
      readonly kind: "attack";
      /** `true` when the opponent fired at us, `false` for our own shot */
      readonly incoming: boolean;
      readonly location: Location;
      readonly result: AttackResult;
    }
  | { readonly kind: "winner"; readonly winner: PlayerId | undefined }
  | { readonly kind: "shipPlaced"; readonly shipId: ShipId }
  | { readonly kind: "joined"; readonly playerId: PlayerId };

const NONE: ClientEvent = { kind: "none" };

/**
 * Protocol state machine for one player. It never touches a socket: callers
 * send the requests it builds and feed every response back through
 * {@link GameClient.handleResponse}, which mirrors the outcome on the local
 * copy of the player.
 */
export class GameClient {
  #gameId: GameId | undefined;
  #playerId: PlayerId | undefined;
  #player: PlayerState | undefined;
  #pendingName: string | undefined;
  #otherPlayers: PlayerId[] = [];

  createGame(): Request {
    return { type: "CreateGame" };
  }

  joinGame(gameId: GameId): void {
    this.#gameId = gameId;
  }

  addPlayer(name: string): Request {
    this.#pendingName = name.trim();
    return { type: "AddPlayer", gameId: this.gameId, name };
  }

  rejoin(playerId: PlayerId): Request {
    return { type: "JoinGame", playerId };
  }

  placeShip(shipId: ShipId, location: Location, direction: Direction): Request {
    return { type: "PlaceShip", playerId: this.playerId, shipId, location, direction };
  }

  advance(target: PlayerId, location: Location): Request {
    return { type: "Advance", attacker: this.playerId, target, location };
  }

  waitForTurn(): Request {
    return { type: "WaitForTurn", playerId: this.playerId };
  }

  winner(): Request {
    return { type: "Winner", gameId: this.gameId };
  }

  handleResponse(response: Response): ClientEvent {
    switch (response.type) {
      case "Error":
        throw GameRuleError.fromWire(response.error);

      case "CreateGame":
        this.joinGame(response.gameId);
        return NONE;

      case "AddPlayer": {
        const config = createGameConfig({
          boardWidth: response.board.width,
          boardHeight: response.board.height,
          fleet: response.fleet,
        });
        this.#playerId = response.playerId;
        this.#player = createPlayer(response.playerId, this.#pendingName ?? "", config);
        this.#pendingName = undefined;
        return { kind: "joined", playerId: response.playerId };
      }

      case "JoinedGame":
        this.#gameId = gameIdOf(response.playerId);
        this.#playerId = response.playerId;
        this.#player = response.player;
        return { kind: "joined", playerId: response.playerId };

      case "PlaceShip":
        placeShip(this.player, response.shipId, response.location, response.direction);
        return { kind: "shipPlaced", shipId: response.shipId };

      case "Advance":
        this.#record(this.player.speculativeField, response.location, response.result);
        return {
          kind: "attack",
          incoming: false,
          location: response.location,
          result: response.result,
        };

      case "WaitForTurn": {
        this.#otherPlayers = [...response.otherPlayers];
        const { lastAttack } = response;
        if (!lastAttack) return NONE;
        // After a rejoin the own field already shows shots fired while we were away.
        const outcome = isHit(lastAttack.result) ? "hit" : "miss";
        if (getCell(this.player.ownField, lastAttack.location) !== outcome) {
          this.#record(this.player.ownField, lastAttack.location, lastAttack.result);
        }
        return {
          kind: "attack",
          incoming: true,
          location: lastAttack.location,
          result: lastAttack.result,
        };
      }

      case "Winner":
        return { kind: "winner", winner: response.winner ?? undefined };
    }
  }

  getPlayer(playerId: PlayerId): PlayerState {
    if (playerId !== this.#playerId || !this.#player) {
      throw GameRuleError.unknownPlayer();
    }
    return this.#player;
  }

  otherPlayerIds(): PlayerId[] {
    return [...this.#otherPlayers];
  }

  get hasPlayer(): boolean {
    return this.#player !== undefined;
  }

  get player(): PlayerState {
    if (!this.#player) throw GameRuleError.communicationError();
    return this.#player;
  }

  get playerId(): PlayerId {
    if (this.#playerId === undefined) throw GameRuleError.communicationError();
    return this.#playerId;
  }

  get gameId(): GameId {
    if (this.#gameId === undefined) throw GameRuleError.communicationError();
    return this.#gameId;
  }

  #record(
    field: PlayerState["ownField"],
    location: Location,
    result: AttackResult,
  ): void {
    if (isHit(result)) {
      recordHit(field, location);
    } else {
      recordMiss(field, location);
    }
  }
}
