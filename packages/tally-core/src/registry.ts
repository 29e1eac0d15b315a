import type { TaskStatus } from './datastore';
import type { TaskProgress } from './progress';

/**
 * Advisory view of a task a worker is currently advancing.
 */
export interface TaskHandle {
  readonly taskId: string;
  readonly current: number;
  readonly status: TaskStatus;
  /** The latest in-memory progress, read without touching the datastore */
  snapshot(): TaskProgress;
  /** Requests cooperative cancellation, observed at the next tick */
  cancel(): void;
}

/**
 * In-memory index of the tasks being executed right now. Bounded by the worker pool size, so
 * historical tasks never accumulate here.
 */
export class TaskRegistry<Handle extends TaskHandle = TaskHandle> {
  private readonly handles = new Map<string, Handle>();

  constructor(readonly capacity: number) {}

  add(handle: Handle): void {
    if (this.handles.has(handle.taskId)) {
      throw new Error(`Task with id ${handle.taskId} is already registered`);
    }

    if (this.handles.size >= this.capacity) {
      throw new Error(`Task registry is full (${this.capacity} tasks)`);
    }

    this.handles.set(handle.taskId, handle);
  }

  remove(taskId: string): boolean {
    return this.handles.delete(taskId);
  }

  get(taskId: string): Handle | undefined {
    return this.handles.get(taskId);
  }

  has(taskId: string): boolean {
    return this.handles.has(taskId);
  }

  list(): Handle[] {
    return Array.from(this.handles.values());
  }

  get size(): number {
    return this.handles.size;
  }
}
