import type { WireError } from "./GameRuleError.js";

/** Raised when a command is built from input that can never be valid. */
export class GameCommandInputError extends Error {
  readonly code = "InvalidRequest" as const;

  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "GameCommandInputError";
  }

  static because(issues: readonly string[]): GameCommandInputError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid command input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid command input")
          : `Invalid command input: ${issues.join("; ")}`;
    return new GameCommandInputError(message, issues);
  }

  toWire(): WireError {
    return { code: this.code, message: this.message };
  }
}
