/**
 * Per-session exclusive lock.
 *
 * Work submitted with `run` executes one task at a time in submission order.
 * A failing task rejects its own promise only; the queue keeps going.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.depth++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => { this.depth--; },
      () => { this.depth--; }
    );
    return result;
  }

  /** Tasks queued or running */
  get pending(): number {
    return this.depth;
  }
}
