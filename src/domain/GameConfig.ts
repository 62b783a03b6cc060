import type { ShipKind } from "./typedefs.js";

export interface GameConfig {
  readonly boardWidth: number;
  readonly boardHeight: number;
  readonly maxPlayers: number;
  readonly fleet: readonly ShipKind[];
}

export type GameConfigOverrides = Partial<GameConfig>;

export const DEFAULT_FLEET: readonly ShipKind[] = [
  "carrier",
  "battleship",
  "destroyer",
  "submarine",
  "patrolBoat",
];

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    boardWidth: overrides.boardWidth ?? 10,
    boardHeight: overrides.boardHeight ?? 10,
    maxPlayers: overrides.maxPlayers ?? 2,
    fleet: [...(overrides.fleet ?? DEFAULT_FLEET)],
  };
}
