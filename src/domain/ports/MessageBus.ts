import type { GameEvent } from "../events.js";
import type { GameId } from "../typedefs.js";

export interface MessageBus {
  publish(channel: string, event: GameEvent): Promise<void>;
}

export interface PublishedEvent<TEvent extends GameEvent = GameEvent> {
  readonly channel: string;
  readonly event: TEvent;
}

/**
 * A bus that can also be awaited. `waitFor` resolves with the first event
 * published after the call that matches `predicate`. A `timeoutMs` of 0 waits
 * indefinitely; aborting `signal` rejects and forgets the waiter.
 */
export interface EventBus extends MessageBus {
  waitFor(
    predicate: (payload: PublishedEvent) => boolean,
    timeoutMs?: number,
    signal?: AbortSignal,
  ): Promise<PublishedEvent>;
}

export function gameChannel(gameId: GameId): string {
  return `game:${gameId}`;
}
