/**
 * Runs tasks one at a time in submission order. Every game on the server shares
 * one queue, so a command always sees the state left by the one before it.
 */
export class CommandQueue {
  #tail: Promise<unknown> = Promise.resolve();
  #length = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.#length += 1;
    const result = this.#tail.then(task);
    // the caller of run() receives the failure; the queue only needs to move on
    this.#tail = result
      .catch(() => undefined)
      .finally(() => {
        this.#length -= 1;
      });
    return result;
  }

  get length(): number {
    return this.#length;
  }
}
