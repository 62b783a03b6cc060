import { currentTurn, getPlayer, otherPlayerIds } from "../entities/GameRules.js";
import { gameIdOf } from "../typedefs.js";
import type { AttackResult, Location, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export interface TurnNotice {
  /** The opponent's shot at this player, if it has not been collected yet */
  readonly lastAttack:
    | { readonly location: Location; readonly result: AttackResult }
    | undefined;
  readonly otherPlayers: readonly PlayerId[];
}

/**
 * Resolves to a notice when it is `playerId`'s turn and to `undefined` otherwise.
 * Callers park and retry on `TurnChanged`.
 */
export class WaitForTurn extends Command<TurnNotice | undefined> {
  readonly type = "WaitForTurn" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ gameGateway, logger }: CommandContext): Promise<TurnNotice | undefined> {
    const game = await gameGateway.loadGameState(gameIdOf(this.playerId));
    getPlayer(game, this.playerId);

    if (currentTurn(game) !== this.playerId) {
      logger?.debug?.("Turn not ready", { playerId: this.playerId, at: this.at });
      return undefined;
    }

    let lastAttack: TurnNotice["lastAttack"];
    if (game.lastAttack && game.lastAttack.target === this.playerId) {
      lastAttack = { location: game.lastAttack.location, result: game.lastAttack.result };
      game.lastAttack = undefined;
      await gameGateway.saveGameState(game);
    }

    return {
      lastAttack,
      otherPlayers: otherPlayerIds(game, this.playerId),
    };
  }
}
