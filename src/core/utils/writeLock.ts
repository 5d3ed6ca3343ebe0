/**
 * Single mutual-exclusion domain for every write to runtime state
 * (tool store, published namespace, approval queue).
 *
 * Operations queue on a promise chain and run one at a time, in call order.
 * A failed operation rejects its own caller and does not block the next one.
 */
export class WriteLock {
  private tail: Promise<unknown> = Promise.resolve();
  private depth = 0;

  run<T>(operation: () => Promise<T> | T): Promise<T> {
    const next = this.tail.then(async () => {
      this.depth++;
      try {
        return await operation();
      } finally {
        this.depth--;
      }
    });
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  /**
   * True while an operation holds the lock.
   */
  get busy(): boolean {
    return this.depth > 0;
  }
}
