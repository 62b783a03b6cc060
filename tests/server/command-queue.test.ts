import { describe, expect, it } from "vitest";

import { CommandQueue } from "../../packages/server/src/CommandQueue.js";

describe("CommandQueue", () => {
  it("runs tasks one after another in submission order", async () => {
    const queue = new CommandQueue();
    const log: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run(async () => {
      log.push("first:start");
      await gate;
      log.push("first:end");
      return 1;
    });
    const second = queue.run(async () => {
      log.push("second");
      return 2;
    });

    expect(queue.length).toBe(2);
    await Promise.resolve();
    release();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
  });

  it("keeps going after a task fails", async () => {
    const queue = new CommandQueue();

    const failed = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(async () => "still running");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("still running");
  });

  it("empties once every task has settled", async () => {
    const queue = new CommandQueue();

    await queue.run(async () => undefined);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(queue.length).toBe(0);
  });
});
