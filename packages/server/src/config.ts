import { CreateGame, createGameConfig, type GameConfig } from "./core.js";

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly debug: boolean;
  readonly game: GameConfig;
}

export class ServerConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "ServerConfigError";
  }

  static because(issues: readonly string[]): ServerConfigError {
    return new ServerConfigError(`Invalid server configuration: ${issues.join("; ")}`, issues);
  }
}

type Env = Readonly<Record<string, string | undefined>>;

const DEFAULT_PORT = 9090;
const DEFAULT_HOST = "0.0.0.0";

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const issues: string[] = [];

  const readInteger = (key: string, fallback: number): number => {
    const raw = env[key]?.trim();
    if (raw === undefined || raw === "") return fallback;
    if (!/^\d+$/.test(raw)) {
      issues.push(`${key} must be a non-negative integer, got "${raw}"`);
      return fallback;
    }
    return Number(raw);
  };

  const port = readInteger("PORT", DEFAULT_PORT);
  if (port > 65_535) {
    issues.push(`PORT must be at most 65535, got ${port}`);
  }

  const game = createGameConfig({
    boardWidth: readInteger("BOARD_WIDTH", 10),
    boardHeight: readInteger("BOARD_HEIGHT", 10),
  });
  issues.push(...CreateGame.validateConfig(game));

  if (issues.length > 0) {
    throw ServerConfigError.because(issues);
  }

  const debug = env["DEBUG"];
  return {
    port,
    host: env["HOST"]?.trim() || DEFAULT_HOST,
    debug: debug !== undefined && debug !== "" && debug !== "0" && debug !== "false",
    game,
  };
}
