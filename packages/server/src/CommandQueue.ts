/**
 * Single logical worker: tasks run strictly one after another, each to completion (awaits
 * included) before the next one starts. Socket messages, HTTP actions and clock callbacks all
 * go through the same queue, so no two mutations of a match ever interleave.
 */
export class CommandQueue {
  #tail: Promise<void> = Promise.resolve();
  #pending = 0;

  get pending(): number {
    return this.#pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.#pending += 1;
    const result = this.#tail.then(task).finally(() => {
      this.#pending -= 1;
    });
    // the caller observes failures through `result`; the chain itself keeps going
    this.#tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    await this.#tail;
  }
}
