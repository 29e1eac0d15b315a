/**
 * FIFO of task ids waiting for a free worker. Workers waiting on an empty queue are handed the
 * next id directly.
 */
export class WorkQueue {
  private readonly items: string[] = [];
  private waiters: Array<(taskId: string | undefined) => void> = [];

  push(taskId: string): void {
    const waiter = this.waiters.shift();

    if (waiter) {
      waiter(taskId);
      return;
    }

    this.items.push(taskId);
  }

  /**
   * Takes the next id, waiting for one when the queue is empty.
   * Resolves `undefined` once the signal aborts.
   */
  take(signal: AbortSignal): Promise<string | undefined> {
    const next = this.items.shift();

    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (signal.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      const waiter = (taskId: string | undefined) => {
        signal.removeEventListener('abort', onAbort);
        resolve(taskId);
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(undefined);
      };

      this.waiters.push(waiter);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Empties the queue, returning the ids that were still waiting.
   */
  drain(): string[] {
    return this.items.splice(0);
  }

  get length(): number {
    return this.items.length;
  }

  /** The number of takers waiting on an empty queue. */
  get idleTakers(): number {
    return this.waiters.length;
  }
}
