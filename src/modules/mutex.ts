// src/modules/mutex.ts
//
// A FIFO async lock. Critical sections may await; waiters run one at a time
// in arrival order.

export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  public get locked(): boolean {
    return this.held;
  }

  public async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let unlock = (): void => undefined;
    this.tail = new Promise<void>((resolve) => {
      unlock = resolve;
    });

    await previous;
    this.held = true;
    try {
      return await fn();
    } finally {
      this.held = false;
      unlock();
    }
  }
}
