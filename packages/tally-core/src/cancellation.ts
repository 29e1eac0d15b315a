/**
 * Maps task ids to cooperative cancellation signals.
 *
 * A signal exists only while its task is queued or running in this process. Cancelling is a single
 * `AbortController.abort()`, so a cancel racing the worker's own poll can never be lost.
 */
export class CancellationCoordinator {
  private readonly controllers = new Map<string, AbortController>();

  /**
   * Registers a signal for the task, returning the existing one when already registered.
   */
  register(taskId: string): AbortSignal {
    const existing = this.controllers.get(taskId);

    if (existing) {
      return existing.signal;
    }

    const controller = new AbortController();
    this.controllers.set(taskId, controller);

    return controller.signal;
  }

  /**
   * Flips the cancellation flag of a registered task. Signalling twice, or signalling an
   * unregistered task, is a no-op.
   *
   * @returns whether the task is registered in this process.
   */
  signalCancel(taskId: string): boolean {
    const controller = this.controllers.get(taskId);

    if (!controller) {
      return false;
    }

    controller.abort();

    return true;
  }

  isCancelled(taskId: string): boolean {
    return this.controllers.get(taskId)?.signal.aborted ?? false;
  }

  has(taskId: string): boolean {
    return this.controllers.has(taskId);
  }

  signalFor(taskId: string): AbortSignal | undefined {
    return this.controllers.get(taskId)?.signal;
  }

  release(taskId: string): void {
    this.controllers.delete(taskId);
  }

  get size(): number {
    return this.controllers.size;
  }
}
