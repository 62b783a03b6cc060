import { winner } from "../entities/GameRules.js";
import type { GameId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class GetWinner extends Command<PlayerId | undefined> {
  readonly type = "Winner" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ gameGateway }: CommandContext): Promise<PlayerId | undefined> {
    const game = await gameGateway.loadGameState(this.gameId);
    return winner(game);
  }
}
