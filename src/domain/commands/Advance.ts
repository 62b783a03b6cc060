import { advance, currentTurn, winner } from "../entities/GameRules.js";
import { gameChannel } from "../ports/MessageBus.js";
import { gameIdOf } from "../typedefs.js";
import type { AttackResult, Location, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** One shot from `attacker` at `target`; the turn passes when it lands. */
export class Advance extends Command<AttackResult> {
  readonly type = "Advance" as const;

  constructor(
    public readonly attacker: PlayerId,
    public readonly target: PlayerId,
    public readonly location: Location,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ gameGateway, bus, logger }: CommandContext): Promise<AttackResult> {
    const gameId = gameIdOf(this.attacker);
    const game = await gameGateway.loadGameState(gameId);

    const result = advance(game, this.attacker, this.target, this.location);
    await gameGateway.saveGameState(game);

    const channel = gameChannel(gameId);
    await bus.publish(channel, {
      type: "AttackResolved",
      gameId,
      attacker: this.attacker,
      target: this.target,
      location: this.location,
      result,
      at: this.at,
    });

    const winnerId = winner(game);
    if (winnerId !== undefined) {
      logger?.info?.("Game won", { gameId, winner: winnerId, at: this.at });
      await bus.publish(channel, {
        type: "GameWon",
        gameId,
        winner: winnerId,
        at: this.at,
      });
    }

    const next = currentTurn(game);
    if (next !== undefined) {
      await bus.publish(channel, {
        type: "TurnChanged",
        gameId,
        playerId: next,
        at: this.at,
      });
    }

    return result;
  }
}
