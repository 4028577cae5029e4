/**
 * Serialization of async operations.
 *
 * @module utils/concurrency
 */

/**
 * Runs async operations one at a time, in call order.
 *
 * A rejected operation does not stop the queue; its error goes to its own caller.
 *
 * @example
 * ```typescript
 * const queue = new SerialQueue();
 * const [first, second] = await Promise.all([
 *   queue.run(() => session.getSources()),
 *   queue.run(() => session.getPassword('mail')),
 * ]);
 * ```
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /**
   * Number of operations queued or running.
   */
  get size(): number {
    return this.waiting;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(fn).finally(() => {
      this.waiting--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
