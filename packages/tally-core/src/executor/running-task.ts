import type { TaskRecord, TaskStatus } from '../datastore';
import { calculatePercentage, type TaskProgress } from '../progress';
import type { TaskHandle } from '../registry';

/**
 * The in-memory state of a task owned by one worker. Only that worker mutates it; `current`
 * here is the authoritative counter, the datastore copy trails it between flushes.
 */
export class RunningTask implements TaskHandle {
  readonly taskId: string;
  readonly x: number;
  readonly y: number;
  current: number;
  status: TaskStatus;
  version: number;
  startedAt: Date | undefined;

  private readonly wake = new AbortController();
  private readonly onCancel = () => this.wake.abort();
  private readonly onShutdown = () => this.wake.abort();

  constructor(
    record: TaskRecord,
    private readonly cancelSignal: AbortSignal,
    private readonly shutdownSignal: AbortSignal,
    private readonly requestCancel: () => void,
  ) {
    this.taskId = record.id;
    this.x = record.x;
    this.y = record.y;
    this.current = record.current;
    this.status = record.status;
    this.version = record.version;
    this.startedAt = record.startedAt;

    if (cancelSignal.aborted || shutdownSignal.aborted) {
      this.wake.abort();
    }

    cancelSignal.addEventListener('abort', this.onCancel, { once: true });
    shutdownSignal.addEventListener('abort', this.onShutdown, { once: true });
  }

  /** Aborts when either cancellation or shutdown is requested; used to cut a tick wait short. */
  get signal(): AbortSignal {
    return this.wake.signal;
  }

  get cancelRequested(): boolean {
    return this.cancelSignal.aborted;
  }

  get shutdownRequested(): boolean {
    return this.shutdownSignal.aborted;
  }

  get finished(): boolean {
    return this.current >= this.y;
  }

  advance(): void {
    this.current = Math.min(this.current + 1, this.y);
  }

  /**
   * Takes the version and status the datastore reports, never moving the counter backwards.
   */
  adopt(record: TaskRecord): void {
    this.version = record.version;
    this.status = record.status;
    this.current = Math.max(this.current, record.current);
    this.startedAt = record.startedAt ?? this.startedAt;
  }

  snapshot(): TaskProgress {
    return {
      taskId: this.taskId,
      current: this.current,
      status: this.status,
      percentage: calculatePercentage(this),
    };
  }

  cancel(): void {
    this.requestCancel();
  }

  dispose(): void {
    this.cancelSignal.removeEventListener('abort', this.onCancel);
    this.shutdownSignal.removeEventListener('abort', this.onShutdown);
  }
}
