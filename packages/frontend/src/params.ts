import { isPlayerId, type GameId, type PlayerId } from "@battleship/core/domain/typedefs.js";

export interface LaunchParams {
  readonly server: string;
  readonly name: string;
  readonly gameId: GameId | undefined;
  readonly playerId: PlayerId | undefined;
  readonly debug: boolean;
}

/** Where the page was served from; the default server lives beside it. */
export interface PageLocation {
  readonly protocol: string;
  readonly host: string;
  readonly search: string;
}

export function readLaunchParams(page: PageLocation): LaunchParams {
  const params = new URLSearchParams(page.search);
  const scheme = page.protocol === "https:" ? "wss" : "ws";

  const game = Number(params.get("game"));
  const player = params.get("player")?.trim();

  return {
    server: params.get("server") ?? `${scheme}://${page.host}/ws`,
    name: params.get("name")?.trim() || "Player",
    gameId: Number.isInteger(game) && game >= 1 ? game : undefined,
    playerId: player !== undefined && isPlayerId(player) ? player : undefined,
    debug: params.has("debug"),
  };
}

/** Same address with `key` set, for `history.replaceState`. */
export function withParam(href: string, key: "game" | "player", value: string): string {
  const url = new URL(href);
  url.searchParams.set(key, value);
  return url.toString();
}
