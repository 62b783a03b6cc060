import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { GameRuleError } from "../errors/GameRuleError.js";
import type { CommandContext, Command } from "./Command.js";

export async function dispatchCommand<TResult>(
  command: Command<TResult>,
  ctx: CommandContext,
): Promise<TResult> {
  const started = Date.now();

  try {
    ctx.logger?.info?.(`[CMD] ${command.type}`, { command });
    const result = await command.execute(ctx);
    ctx.logger?.info?.(`[CMD OK] ${command.type}`, {
      ms: Date.now() - started,
    });
    return result;
  } catch (error) {
    if (error instanceof GameRuleError || error instanceof GameCommandInputError) {
      ctx.logger?.warn?.(`[CMD REJECTED] ${command.type}`, { reason: error.message });
    } else {
      ctx.logger?.error?.(`[CMD ERR] ${command.type}`, { error });
    }
    throw error;
  }
}
