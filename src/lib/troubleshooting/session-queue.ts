/**
 * Per-session FIFO serialization.
 *
 * Actions for one message run strictly in arrival order; actions for
 * different messages never wait on each other. A failed task does not block
 * the tasks queued behind it.
 */

export class SessionQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(sessionId: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const result = previous.then(() => task());
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);
    void tail.then(() => {
      if (this.tails.get(sessionId) === tail) this.tails.delete(sessionId);
    });
    return result;
  }

  /** Sessions with queued or running work */
  get size(): number {
    return this.tails.size;
  }
}
