import { getPlayer } from "../entities/GameRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { PlayerState } from "../ports/GameGateway.js";
import { gameIdOf, isPlayerId } from "../typedefs.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** Reconnects to an existing seat and hands back that player's full view. */
export class JoinGame extends Command<PlayerState> {
  readonly type = "JoinGame" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();

    if (!isPlayerId(playerId)) {
      throw GameCommandInputError.because(["Player identifier must look like <game>.<player>"]);
    }
  }

  async execute({ gameGateway, logger }: CommandContext): Promise<PlayerState> {
    const game = await gameGateway.loadGameState(gameIdOf(this.playerId));
    const player = getPlayer(game, this.playerId);

    logger?.info?.("Player rejoined game", {
      type: this.type,
      gameId: game.id,
      playerId: this.playerId,
      at: this.at,
    });

    return player;
  }
}
