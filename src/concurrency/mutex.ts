/**
 * Async mutex for code that spans `await` points.
 *
 * Callers queue in arrival order and run one at a time. There is no
 * timeout and no cancellation: a queued task waits until every task
 * ahead of it settles. Not reentrant, so a task must never call
 * runExclusive on the mutex it already holds.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** True while a task is running or queued */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task).finally(() => {
      this.pending--;
    });
    // A failed task releases the lock like a successful one
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * One mutex per resource name, created on first request.
 * Lookup and creation happen synchronously, so two callers asking for
 * the same new name always get the same mutex.
 */
export class LockTable {
  private locks = new Map<string, Mutex>();

  get(name: string): Mutex {
    let lock = this.locks.get(name);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(name, lock);
    }
    return lock;
  }

  get size(): number {
    return this.locks.size;
  }
}
