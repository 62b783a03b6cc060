import { LocalGame } from "@battleship/core/client/LocalGame.js";
import { describeAttack } from "@battleship/core/domain/entities/Fleet.js";
import type { Rng } from "@battleship/core/domain/entities/random.js";

import { attack, placeShips, printBoards } from "./playbook.js";
import type { Prompter } from "./prompter.js";

/**
 * A game against the computer. The human joins last and therefore shoots first.
 */
export async function runLocalGame(prompter: Prompter, rng: Rng = Math.random): Promise<void> {
  const game = new LocalGame(undefined, rng);
  const computer = game.addPlayer("Computer");
  const human = game.addPlayer("Player 1");

  await placeShips(prompter, game, human);
  game.placeShipsAutomatically(computer);

  let winner = game.winner();
  while (winner === undefined) {
    printBoards(prompter, game, human);
    await attack(prompter, game, human, computer);

    winner = game.winner();
    if (winner !== undefined) break;

    prompter.print(`${game.getPlayer(computer).name}'s turn`);
    const shot = game.advanceAutomatically(computer, human);
    prompter.print(describeAttack(shot.result));
    winner = game.winner();
  }

  printBoards(prompter, game, human);
  prompter.print(`${game.getPlayer(winner).name} wins!`);
}
