import { lineLayout, shipSize } from "../entities/Fleet.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { GameConfig } from "../GameConfig.js";
import { gameChannel } from "../ports/MessageBus.js";
import type { GameId, TimePoint } from "../typedefs.js";
import { SHIP_KINDS } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

const MAX_ROWS = 26;
const MAX_COLUMNS = 99;

export class CreateGame extends Command<GameId> {
  readonly type = "CreateGame" as const;

  constructor(
    public readonly config: GameConfig,
    public readonly at: TimePoint,
  ) {
    super();

    const issues = CreateGame.validateConfig(config);
    if (issues.length > 0) {
      throw GameCommandInputError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<GameId> {
    const { gameGateway, bus, logger } = ctx;

    const game = await gameGateway.createGame(this.config, this.at);

    logger?.info?.("Game created", {
      type: this.type,
      gameId: game.id,
      at: this.at,
    });

    await bus.publish(gameChannel(game.id), {
      type: "GameCreated",
      gameId: game.id,
      at: this.at,
    });

    return game.id;
  }

  static validateConfig(config: GameConfig): readonly string[] {
    const issues: string[] = [];

    if (!CreateGame.isIntegerInRange(config.boardHeight, 1, MAX_ROWS)) {
      issues.push(`boardHeight must be an integer between 1 and ${MAX_ROWS}`);
    }

    if (!CreateGame.isIntegerInRange(config.boardWidth, 1, MAX_COLUMNS)) {
      issues.push(`boardWidth must be an integer between 1 and ${MAX_COLUMNS}`);
    }

    if (config.maxPlayers !== 2) {
      issues.push("maxPlayers must be 2");
    }

    if (config.fleet.length === 0) {
      issues.push("fleet must contain at least one ship");
    }

    const longest = Math.max(config.boardWidth, config.boardHeight);
    for (const kind of config.fleet) {
      if (!SHIP_KINDS.includes(kind)) {
        issues.push(`unknown ship kind ${String(kind)}`);
      } else if (shipSize(kind) > longest) {
        issues.push(`${kind} does not fit on a ${config.boardWidth}x${config.boardHeight} board`);
      }
    }

    if (issues.length === 0 && !lineLayout(config.fleet, config.boardWidth, config.boardHeight)) {
      issues.push(`fleet does not fit on a ${config.boardWidth}x${config.boardHeight} board`);
    }

    return issues;
  }

  private static isIntegerInRange(value: number, min: number, max: number): boolean {
    return Number.isInteger(value) && value >= min && value <= max;
  }
}
