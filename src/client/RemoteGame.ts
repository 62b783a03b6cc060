import { GameRuleError } from "../domain/errors/GameRuleError.js";
import type { PlayerState } from "../domain/ports/GameGateway.js";
import type {
  AttackResult,
  Direction,
  GameId,
  Location,
  PlayerId,
  ShipId,
} from "../domain/typedefs.js";
import type { Request } from "../protocol/messages.js";
import { GameClient, type ClientEvent } from "./GameClient.js";
import type { GameConnection } from "./GameConnection.js";
import type { Play } from "./Play.js";

/** A seat in a game hosted by a server, reached through a {@link GameConnection}. */
export class RemoteGame implements Play {
  readonly #client: GameClient;
  readonly #connection: GameConnection;

  private constructor(connection: GameConnection, client: GameClient) {
    this.#connection = connection;
    this.#client = client;
  }

  /** Creates a game when `gameId` is omitted, then takes a seat in it as `name`. */
  static async join(
    connection: GameConnection,
    name: string,
    gameId?: GameId,
  ): Promise<RemoteGame> {
    const game = new RemoteGame(connection, new GameClient());

    if (gameId === undefined) {
      await game.#exchange(game.#client.createGame());
    } else {
      game.#client.joinGame(gameId);
    }
    await game.#exchange(game.#client.addPlayer(name));

    return game;
  }

  static async rejoin(connection: GameConnection, playerId: PlayerId): Promise<RemoteGame> {
    const game = new RemoteGame(connection, new GameClient());
    await game.#exchange(game.#client.rejoin(playerId));
    return game;
  }

  async placeShip(
    playerId: PlayerId,
    shipId: ShipId,
    location: Location,
    direction: Direction,
  ): Promise<void> {
    if (playerId !== this.playerId) {
      throw GameRuleError.unknownPlayer();
    }
    const event = await this.#exchange(this.#client.placeShip(shipId, location, direction));
    if (event.kind !== "shipPlaced") {
      throw GameRuleError.communicationError();
    }
  }

  async advance(attacker: PlayerId, target: PlayerId, location: Location): Promise<AttackResult> {
    if (attacker !== this.playerId) {
      throw GameRuleError.unknownPlayer();
    }
    const event = await this.#exchange(this.#client.advance(target, location));
    if (event.kind !== "attack") {
      throw GameRuleError.communicationError();
    }
    return event.result;
  }

  /** Resolves once it is our turn, with the opponent's shot if one landed meanwhile. */
  async waitForTurn(): Promise<AttackResult | undefined> {
    const event = await this.#exchange(this.#client.waitForTurn());
    return event.kind === "attack" ? event.result : undefined;
  }

  async winner(): Promise<PlayerId | undefined> {
    const event = await this.#exchange(this.#client.winner());
    if (event.kind !== "winner") {
      throw GameRuleError.communicationError();
    }
    return event.winner;
  }

  getPlayer(playerId: PlayerId): PlayerState {
    return this.#client.getPlayer(playerId);
  }

  otherPlayerIds(): PlayerId[] {
    return this.#client.otherPlayerIds();
  }

  get playerId(): PlayerId {
    return this.#client.playerId;
  }

  get gameId(): GameId {
    return this.#client.gameId;
  }

  async #exchange(request: Request): Promise<ClientEvent> {
    const response = await this.#connection.request(request);
    return this.#client.handleResponse(response);
  }
}
