/**
 * Core domain typedefs used throughout the game.
 * Identifiers stay plain aliases; the helpers below are the only places that
 * know how a player id is spelled.
 */

/** Unique identifier of a game hosted by the server */
export type GameId = number;

/** Unique identifier of a player, spelled `<gameId>.<n>` */
export type PlayerId = string;

/** Identifier of a ship within one player's fleet */
export type ShipId = number;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Zero-based board coordinate */
export interface Location {
  readonly column: number;
  readonly row: number;
}

export type Direction = "north" | "south" | "east" | "west";

export const DIRECTIONS: readonly Direction[] = ["north", "south", "east", "west"];

export type Cell = "empty" | "miss" | "hit";

export type ShipKind = "carrier" | "battleship" | "destroyer" | "submarine" | "patrolBoat";

export const SHIP_KINDS: readonly ShipKind[] = [
  "carrier",
  "battleship",
  "destroyer",
  "submarine",
  "patrolBoat",
];

/** Outcome of a single shot */
export type AttackResult =
  | { readonly kind: "hit" }
  | { readonly kind: "miss" }
  | { readonly kind: "sunk"; readonly ship: string };

const PLAYER_ID_PATTERN = /^(\d+)\.(\d+)$/;

export function playerIdOf(gameId: GameId, index: number): PlayerId {
  return `${gameId}.${index}`;
}

export function parsePlayerId(
  text: string,
): { readonly gameId: GameId; readonly index: number } {
  const match = PLAYER_ID_PATTERN.exec(text.trim());
  if (!match) {
    throw new Error("expected <number>.<number>");
  }
  const [, game, index] = match;
  return { gameId: Number(game), index: Number(index) };
}

export function gameIdOf(playerId: PlayerId): GameId {
  return parsePlayerId(playerId).gameId;
}

export function isPlayerId(value: unknown): value is PlayerId {
  return typeof value === "string" && PLAYER_ID_PATTERN.test(value);
}
