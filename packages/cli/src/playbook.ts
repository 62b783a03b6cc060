import type { Play } from "@battleship/core/client/Play.js";
import { parseDirection, parseLocation } from "@battleship/core/domain/entities/Coordinates.js";
import { describeAttack, isPlaced, shipName } from "@battleship/core/domain/entities/Fleet.js";
import { GameRuleError } from "@battleship/core/domain/errors/GameRuleError.js";
import type { AttackResult, PlayerId } from "@battleship/core/domain/typedefs.js";

import { ask, type Prompter } from "./prompter.js";
import { formatBoards } from "./render.js";

export function printBoards(prompter: Prompter, play: Play, playerId: PlayerId): void {
  for (const line of formatBoards(play.getPlayer(playerId))) {
    prompter.print(line);
  }
}

/** Walks the player through placing every ship that is not placed yet. */
export async function placeShips(prompter: Prompter, play: Play, playerId: PlayerId): Promise<void> {
  for (const ship of play.getPlayer(playerId).ships) {
    if (isPlaced(ship)) continue;
    printBoards(prompter, play, playerId);

    const name = shipName(ship.kind);
    for (;;) {
      const location = await ask(prompter, `Location for ${name}?: `, parseLocation);
      const direction = await ask(prompter, `Direction for ${name}?: `, parseDirection);
      try {
        await play.placeShip(playerId, ship.id, location, direction);
        break;
      } catch (error) {
        if (!(error instanceof GameRuleError)) throw error;
        prompter.print(`error: ${error.message}`);
      }
    }
  }
}

/** Asks for a target until the shot is accepted and prints its outcome. */
export async function attack(
  prompter: Prompter,
  play: Play,
  attacker: PlayerId,
  target: PlayerId,
): Promise<AttackResult> {
  for (;;) {
    const location = await ask(prompter, "guess: ", parseLocation);
    try {
      const result = await play.advance(attacker, target, location);
      prompter.print(describeAttack(result));
      return result;
    } catch (error) {
      if (!(error instanceof GameRuleError) || error.code === "CommunicationError") throw error;
      prompter.print(error.message);
    }
  }
}
