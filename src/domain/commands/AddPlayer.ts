import { addPlayer } from "../entities/GameRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { gameChannel } from "../ports/MessageBus.js";
import type { GameId, PlayerId, ShipKind, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

const MAX_NAME_LENGTH = 32;

export interface PlayerAdded {
  readonly playerId: PlayerId;
  readonly board: { readonly width: number; readonly height: number };
  readonly fleet: readonly ShipKind[];
}

export class AddPlayer extends Command<PlayerAdded> {
  readonly type = "AddPlayer" as const;
  readonly name: string;

  constructor(
    public readonly gameId: GameId,
    name: string,
    public readonly at: TimePoint,
  ) {
    super();

    this.name = name.trim();
    const issues = AddPlayer.validateName(this.name);
    if (issues.length > 0) {
      throw GameCommandInputError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<PlayerAdded> {
    const { gameGateway, bus, logger } = ctx;

    const game = await gameGateway.loadGameState(this.gameId);
    const playerId = addPlayer(game, this.name);
    await gameGateway.saveGameState(game);

    logger?.info?.("Player joined game", {
      type: this.type,
      gameId: this.gameId,
      playerId,
      at: this.at,
    });

    await bus.publish(gameChannel(this.gameId), {
      type: "PlayerAdded",
      gameId: this.gameId,
      playerId,
      name: this.name,
      at: this.at,
    });

    return {
      playerId,
      board: { width: game.config.boardWidth, height: game.config.boardHeight },
      fleet: [...game.config.fleet],
    };
  }

  private static validateName(name: string): readonly string[] {
    if (name.length === 0) {
      return ["Player name must not be empty"];
    }
    if (name.length > MAX_NAME_LENGTH) {
      return [`Player name must be at most ${MAX_NAME_LENGTH} characters`];
    }
    return [];
  }
}
