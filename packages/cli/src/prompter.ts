import { createInterface } from "node:readline/promises";

/** Line-oriented terminal I/O, swapped for a scripted fake in tests. */
export interface Prompter {
  /** Resolves with the next line, or `undefined` once input is exhausted. */
  question(prompt: string): Promise<string | undefined>;
  print(line: string): void;
  close(): void;
}

export class InputClosedError extends Error {
  constructor() {
    super("input closed");
    this.name = "InputClosedError";
  }
}

/**
 * Asks until `parse` accepts the answer, printing `error: <message>` for every
 * rejected line.
 */
export async function ask<T>(
  prompter: Prompter,
  prompt: string,
  parse: (line: string) => T,
): Promise<T> {
  for (;;) {
    const line = await prompter.question(prompt);
    if (line === undefined) {
      throw new InputClosedError();
    }
    try {
      return parse(line);
    } catch (error) {
      prompter.print(`error: ${errorMessage(error)}`);
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;

  return {
    async question(prompt: string): Promise<string | undefined> {
      if (closed) return undefined;
      output.write(prompt);
      const next = await lines.next();
      if (next.done) {
        closed = true;
        return undefined;
      }
      return next.value;
    },
    print(line: string): void {
      output.write(`${line}\n`);
    },
    close(): void {
      closed = true;
      rl.close();
    },
  };
}
