import { describe, expect, it } from "vitest";

import { ServerConfigError, loadServerConfig } from "../../packages/server/src/config.js";
import { createGameConfig } from "../../src/domain/GameConfig.js";

describe("loadServerConfig", () => {
  it("falls back to defaults", () => {
    expect(loadServerConfig({})).toEqual({
      port: 9090,
      host: "0.0.0.0",
      debug: false,
      game: createGameConfig(),
    });
  });

  it("reads the environment", () => {
    const config = loadServerConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      BOARD_WIDTH: "12",
      BOARD_HEIGHT: "8",
      DEBUG: "1",
    });

    expect(config).toMatchObject({ port: 8080, host: "127.0.0.1", debug: true });
    expect(config.game).toMatchObject({ boardWidth: 12, boardHeight: 8 });
  });

  it("treats 0, false and empty DEBUG as off", () => {
    for (const value of ["0", "false", ""]) {
      expect(loadServerConfig({ DEBUG: value }).debug).toBe(false);
    }
  });

  it("reports every invalid setting together", () => {
    try {
      loadServerConfig({ PORT: "http", BOARD_HEIGHT: "30" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ServerConfigError);
      expect(error).toMatchObject({
        message:
          'Invalid server configuration: PORT must be a non-negative integer, got "http"; boardHeight must be an integer between 1 and 26',
      });
    }
  });

  it("rejects a board the fleet cannot be laid out on", () => {
    expect(() => loadServerConfig({ BOARD_WIDTH: "10", BOARD_HEIGHT: "1" })).toThrow(
      "Invalid server configuration: fleet does not fit on a 10x1 board",
    );
  });

  it("rejects ports above 65535", () => {
    expect(() => loadServerConfig({ PORT: "70000" })).toThrow("PORT must be at most 65535, got 70000");
  });
});
