/**
 * Controls how many promises are executed at once
 */
export class PromisePool {
  private readonly _queue: Array<Queued> = [];
  private active = 0;

  constructor(private readonly maxN: number) {
    if (!Number.isInteger(maxN) || maxN < 1) {
      throw new Error(`Need a positive integer, got: ${maxN}`);
    }
  }

  public queue<A>(pThunk: () => Promise<A>): Promise<A> {
    return new Promise<A>((resolve, reject) => {
      this._queue.push({
        // Thunks that throw synchronously reject like any other failure
        run: () => Promise.resolve().then(pThunk).then(resolve, reject),
      });
      this.launchMore();
    });
  }

  public all<A>(thunks: Array<() => Promise<A>>): Promise<Array<A>> {
    return Promise.all(thunks.map((t) => this.queue(t)));
  }

  /**
   * Run all thunks and wait for every one of them, whether it succeeds or fails
   */
  public allSettled<A>(thunks: Array<() => Promise<A>>): Promise<Array<PromiseSettledResult<A>>> {
    return Promise.allSettled(thunks.map((t) => this.queue(t)));
  }

  private launchMore() {
    if (this.active >= this.maxN) { return; }
    const next = this._queue.shift();
    if (!next) { return; }

    this.active += 1;
    void next.run().finally(() => {
      this.active -= 1;
      this.launchMore();
    });
  }
}

export const PROMISE_POOL = new PromisePool(4);

interface Queued {
  readonly run: () => Promise<void>;
}

/**
 * Mutual exclusion for async critical sections
 *
 * A pool of one: callers queue up and run strictly one after the other.
 */
export class Lock {
  private readonly pool = new PromisePool(1);

  public withLock<A>(block: () => Promise<A>): Promise<A> {
    return this.pool.queue(block);
  }
}
