/**
 * Promise-chain mutex. Tasks run one at a time in the order they were
 * queued; a failing task rejects its own promise and the queue moves on.
 */
export class StateLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    // The caller sees the failure through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
