import { describe, expect, it } from "vitest";

import { parseArgs } from "../../packages/cli/src/args.js";

describe("parseArgs", () => {
  it("plays locally without arguments", () => {
    expect(parseArgs([])).toEqual({ kind: "local" });
  });

  it("starts a server with an optional port", () => {
    expect(parseArgs(["server"])).toEqual({ kind: "server" });
    expect(parseArgs(["server", "8080"])).toEqual({ kind: "server", port: "8080" });
  });

  it("connects a client, optionally to an existing game", () => {
    expect(parseArgs(["client", "ws://localhost:9090/ws"])).toEqual({
      kind: "client",
      url: "ws://localhost:9090/ws",
    });
    expect(parseArgs(["client", "ws://localhost:9090/ws", "3"])).toEqual({
      kind: "client",
      url: "ws://localhost:9090/ws",
      gameId: 3,
    });
  });

  it("explains what is wrong", () => {
    expect(parseArgs(["client"])).toEqual({ kind: "invalid", message: "client requires a server url" });
    expect(parseArgs(["client", "ws://x", "two"])).toEqual({
      kind: "invalid",
      message: "invalid game id two",
    });
    expect(parseArgs(["serve"])).toEqual({ kind: "invalid", message: "invalid command serve" });
  });
});
