/* eslint-disable functional/immutable-data */
import { GameClient, type ClientEvent } from "@battleship/core/client/GameClient.js";
import { getCell } from "@battleship/core/domain/entities/BattleField.js";
import { formatDirection, formatLocation } from "@battleship/core/domain/entities/Coordinates.js";
import { describeAttack, isHit, isPlaced, shipName } from "@battleship/core/domain/entities/Fleet.js";
import { GameRuleError } from "@battleship/core/domain/errors/GameRuleError.js";
import type { Logger } from "@battleship/core/domain/ports/Logger.js";
import type {
  AttackResult,
  Direction,
  GameId,
  Location,
  PlayerId,
  ShipId,
} from "@battleship/core/domain/typedefs.js";
import { decodeResponse, encodeRequest } from "@battleship/core/protocol/codec.js";
import type { Request, Response } from "@battleship/core/protocol/messages.js";

import type { DrawingContext } from "./DrawingContext.js";
import { RenderableField } from "./RenderableField.js";

export const CANVAS_WIDTH = 1224;
export const CANVAS_HEIGHT = 590;

const OWN_FIELD_X = 10;
const ENEMY_FIELD_X = 550;
const FIELD_Y = 55;

export type MessageLevel = "info" | "warn" | "error";

export const MESSAGE_COLORS: Readonly<Record<MessageLevel, string>> = {
  info: "blue",
  warn: "orange",
  error: "red",
};

export interface StatusMessage {
  readonly level: MessageLevel;
  readonly text: string;
}

export type BrowserState =
  | { readonly kind: "connecting" }
  | { readonly kind: "creatingGame" }
  | { readonly kind: "addingPlayer" }
  | { readonly kind: "placingShip"; readonly shipId: ShipId; readonly direction: Direction }
  | {
      readonly kind: "confirmingPlacement";
      readonly shipId: ShipId;
      readonly direction: Direction;
    }
  | { readonly kind: "waitingForTurn" }
  | { readonly kind: "myTurn" }
  | { readonly kind: "waitingForAttackResult" }
  | { readonly kind: "checkingWinner"; readonly next: "myTurn" | "waitForTurn" }
  | { readonly kind: "gameOver"; readonly winner: PlayerId }
  | { readonly kind: "error" };

export interface BrowserGameOptions {
  readonly context: DrawingContext;
  readonly send: (text: string) => void;
  readonly name: string;
  /** Join this game instead of creating one */
  readonly gameId?: GameId;
  /** Take over an existing seat; wins over `gameId` */
  readonly playerId?: PlayerId;
  readonly onGameCreated?: (gameId: GameId) => void;
  readonly onJoined?: (playerId: PlayerId) => void;
  readonly logger?: Logger;
}

const ROTATION: Readonly<Record<Direction, Direction>> = {
  south: "east",
  east: "north",
  north: "west",
  west: "south",
};

type Hover = { readonly field: "own" | "enemy"; readonly location: Location };

/**
 * Canvas client for one player. Input arrives through `open`, `receive`,
 * `click`, `hover`, `press` and `disconnected`; every transition redraws.
 */
export class BrowserGame {
  readonly #options: BrowserGameOptions;
  readonly #client = new GameClient();
  #ownField = new RenderableField(OWN_FIELD_X, FIELD_Y, 10, 10);
  #enemyField = new RenderableField(ENEMY_FIELD_X, FIELD_Y, 10, 10);
  #state: BrowserState = { kind: "connecting" };
  #message: StatusMessage = { level: "info", text: "Connecting" };
  #hover: Hover | undefined;
  #frames: Promise<void> = Promise.resolve();

  constructor(options: BrowserGameOptions) {
    this.#options = options;
  }

  get state(): BrowserState {
    return this.#state;
  }

  get message(): StatusMessage {
    return this.#message;
  }

  open(): void {
    const { playerId, gameId, name } = this.#options;
    if (playerId !== undefined) {
      this.#enter({ kind: "addingPlayer" }, "info", `Rejoining as ${playerId}`);
      this.#send(this.#client.rejoin(playerId));
    } else if (gameId !== undefined) {
      this.#client.joinGame(gameId);
      this.#enter({ kind: "addingPlayer" }, "info", `Joining game ${gameId}`);
      this.#send(this.#client.addPlayer(name));
    } else {
      this.#enter({ kind: "creatingGame" }, "info", "Creating game");
      this.#send(this.#client.createGame());
    }
  }

  /** Frames are applied in arrival order even when a Blob has to be read first. */
  receive(data: string | Blob): Promise<void> {
    this.#frames = this.#frames
      .then(async () => {
        const text = typeof data === "string" ? data : await data.text();
        this.#handle(decodeResponse(text));
      })
      .catch((error: unknown) => {
        this.#options.logger?.error?.("Failed to handle frame", { error });
        this.#fail(error);
      });
    return this.#frames;
  }

  disconnected(): void {
    if (this.#state.kind === "gameOver" || this.#state.kind === "error") return;
    this.#enter({ kind: "error" }, "error", "Connection closed");
  }

  click(x: number, y: number): void {
    const state = this.#state;
    if (state.kind === "placingShip") {
      const location = this.#ownField.locationAt(x, y);
      if (!location) return;
      this.#state = {
        kind: "confirmingPlacement",
        shipId: state.shipId,
        direction: state.direction,
      };
      this.#send(this.#client.placeShip(state.shipId, location, state.direction));
      this.render();
    } else if (state.kind === "myTurn") {
      const location = this.#enemyField.locationAt(x, y);
      if (location) this.#attack(location);
    }
  }

  hover(x: number, y: number): void {
    const own = this.#ownField.locationAt(x, y);
    const enemy = this.#enemyField.locationAt(x, y);
    if (this.#state.kind === "placingShip" && own) {
      this.#hover = { field: "own", location: own };
    } else if (this.#state.kind === "myTurn" && enemy) {
      this.#hover = { field: "enemy", location: enemy };
    } else {
      this.#hover = undefined;
    }
    this.render();
  }

  press(key: string): void {
    const state = this.#state;
    if (state.kind !== "placingShip" || key.toLowerCase() !== "r") return;
    this.#placing(state.shipId, ROTATION[state.direction]);
  }

  render(): void {
    const { context } = this.#options;
    context.clearRect(0, 0, CANVAS_WIDTH, CANVAS_HEIGHT);

    context.fillStyle = MESSAGE_COLORS[this.#message.level];
    context.fillRect(10, 5, CANVAS_WIDTH, 35);
    context.fillStyle = "white";
    context.font = "25px arial";
    context.fillText(this.#message.text, 20, 30);

    if (!this.#client.hasPlayer) return;
    const player = this.#client.player;
    context.beginPath();
    this.#ownField.render(context, player.ownField, player.ships, this.#hoverOn("own"));
    this.#enemyField.render(context, player.speculativeField, [], this.#hoverOn("enemy"));
    context.stroke();
  }

  #handle(response: Response): void {
    const event = this.#client.handleResponse(response);
    const state = this.#state;

    switch (state.kind) {
      case "creatingGame":
        if (response.type !== "CreateGame") break;
        this.#options.onGameCreated?.(this.#client.gameId);
        this.#enter({ kind: "addingPlayer" }, "info", `Joining game ${this.#client.gameId}`);
        this.#send(this.#client.addPlayer(this.#options.name));
        return;

      case "addingPlayer":
        if (event.kind !== "joined") break;
        this.#layOutFields();
        this.#options.onJoined?.(event.playerId);
        this.#placeNextShip();
        return;

      case "confirmingPlacement":
        if (event.kind !== "shipPlaced") break;
        this.#placeNextShip();
        return;

      case "waitingForTurn":
        if (response.type !== "WaitForTurn") break;
        this.#turnArrived(event);
        return;

      case "waitingForAttackResult":
        if (event.kind !== "attack") break;
        this.#enter(
          { kind: "checkingWinner", next: "waitForTurn" },
          "info",
          `Your attack: ${describeAttack(event.result)}, waiting for enemy`,
        );
        this.#send(this.#client.winner());
        return;

      case "checkingWinner":
        if (event.kind !== "winner") break;
        this.#winnerChecked(event.winner, state.next);
        return;

      case "connecting":
      case "placingShip":
      case "myTurn":
      case "gameOver":
      case "error":
        break;
    }

    this.#options.logger?.warn?.("Unexpected response", { state: state.kind, type: response.type });
    throw GameRuleError.communicationError();
  }

  #turnArrived(event: ClientEvent): void {
    if (event.kind === "attack") {
      this.#enter(
        { kind: "checkingWinner", next: "myTurn" },
        attackLevel(event.result),
        `Enemy attack: ${describeAttack(event.result)}`,
      );
      this.#send(this.#client.winner());
      return;
    }
    this.#enter({ kind: "myTurn" }, "info", "Your turn");
  }

  #winnerChecked(winner: PlayerId | undefined, next: "myTurn" | "waitForTurn"): void {
    if (winner !== undefined) {
      const won = winner === this.#client.playerId;
      this.#enter({ kind: "gameOver", winner }, won ? "info" : "error", won ? "You win!" : "You lose");
    } else if (next === "myTurn") {
      this.#enter({ kind: "myTurn" }, this.#message.level, `${this.#message.text}, your turn`);
    } else {
      this.#waitForTurn(this.#message.level, this.#message.text);
    }
  }

  #layOutFields(): void {
    const { width, height } = this.#client.player.ownField;
    this.#ownField = new RenderableField(OWN_FIELD_X, FIELD_Y, width, height);
    this.#enemyField = new RenderableField(ENEMY_FIELD_X, FIELD_Y, width, height);
  }

  #placeNextShip(): void {
    const ship = this.#client.player.ships.find((candidate) => !isPlaced(candidate));
    if (ship) {
      this.#placing(ship.id, "south");
    } else {
      this.#waitForTurn("info", "Waiting for turn");
    }
  }

  #placing(shipId: ShipId, direction: Direction): void {
    const ship = this.#client.player.ships.find((candidate) => candidate.id === shipId);
    const name = ship ? shipName(ship.kind) : `ship ${shipId}`;
    this.#enter(
      { kind: "placingShip", shipId, direction },
      "info",
      `Place ${name} facing ${formatDirection(direction)} (r to rotate)`,
    );
  }

  #waitForTurn(level: MessageLevel, text: string): void {
    this.#enter({ kind: "waitingForTurn" }, level, text);
    this.#send(this.#client.waitForTurn());
  }

  #attack(location: Location): void {
    if (getCell(this.#client.player.speculativeField, location) !== "empty") {
      this.#message = { level: "warn", text: `Already fired at ${formatLocation(location)}` };
      this.render();
      return;
    }

    const [target] = this.#client.otherPlayerIds();
    if (target === undefined) {
      this.#enter({ kind: "error" }, "error", "No opponent to attack");
      return;
    }

    this.#state = { kind: "waitingForAttackResult" };
    this.#hover = undefined;
    this.#send(this.#client.advance(target, location));
    this.render();
  }

  #fail(error: unknown): void {
    const state = this.#state;
    const text = error instanceof Error ? error.message : "Unknown error";

    if (error instanceof GameRuleError && state.kind === "confirmingPlacement") {
      this.#enter(
        { kind: "placingShip", shipId: state.shipId, direction: state.direction },
        "error",
        text,
      );
    } else if (error instanceof GameRuleError && state.kind === "waitingForAttackResult") {
      this.#enter({ kind: "myTurn" }, "error", text);
    } else {
      this.#enter({ kind: "error" }, "error", text);
    }
  }

  #enter(state: BrowserState, level: MessageLevel, text: string): void {
    this.#options.logger?.debug?.("State", { from: this.#state.kind, to: state.kind });
    this.#state = state;
    this.#message = { level, text };
    this.render();
  }

  #send(request: Request): void {
    this.#options.send(encodeRequest(request));
  }

  #hoverOn(field: Hover["field"]): Location | undefined {
    return this.#hover?.field === field ? this.#hover.location : undefined;
  }
}

function attackLevel(result: AttackResult): MessageLevel {
  return isHit(result) ? "warn" : "info";
}
