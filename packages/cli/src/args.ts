export type CliCommand =
  | { readonly kind: "local" }
  | { readonly kind: "server"; readonly port?: string }
  | { readonly kind: "client"; readonly url: string; readonly gameId?: number }
  | { readonly kind: "invalid"; readonly message: string };

export function parseArgs(args: readonly string[]): CliCommand {
  const [command, first, second] = args;
  switch (command) {
    case undefined:
      return { kind: "local" };
    case "server":
      return first === undefined ? { kind: "server" } : { kind: "server", port: first };
    case "client": {
      if (first === undefined) {
        return { kind: "invalid", message: "client requires a server url" };
      }
      if (second === undefined) {
        return { kind: "client", url: first };
      }
      const gameId = Number(second);
      if (!Number.isInteger(gameId) || gameId < 1) {
        return { kind: "invalid", message: `invalid game id ${second}` };
      }
      return { kind: "client", url: first, gameId };
    }
    default:
      return { kind: "invalid", message: `invalid command ${command}` };
  }
}
