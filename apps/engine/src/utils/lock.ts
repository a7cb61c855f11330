/**
 * Async mutual exclusion: callers run one at a time, in arrival order.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(task);
    // Keep the chain alive whether or not the task fails
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}
