import type { GameConfig } from "../GameConfig.js";
import type { GameGateway } from "../ports/GameGateway.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly gameGateway: GameGateway;
  readonly bus: MessageBus;
  readonly config: GameConfig;
  readonly logger?: Logger;
}

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
