import { type TaskRecord, TaskStatus } from './datastore';

export type TaskProgress = {
  taskId: string;
  current: number;
  status: TaskStatus;
  /** Share of the range covered so far, between 0 and 100 */
  percentage: number;
  /** Present when the task FAILED */
  error?: string;
};

export type PercentageInput = Pick<TaskRecord, 'x' | 'y' | 'current' | 'status'>;

/**
 * Percentage = ((current - x) / max(1, y - x)) * 100, clamped to [0, 100].
 * A single-value range (x == y) has nothing to count, so it reports 100 only once COMPLETED.
 */
export function calculatePercentage(input: PercentageInput): number {
  const span = input.y - input.x;

  if (span === 0) {
    return input.status === TaskStatus.COMPLETED ? 100 : 0;
  }

  const percentage = ((input.current - input.x) / Math.max(1, span)) * 100;

  return Math.min(100, Math.max(0, percentage));
}

export function toProgress(record: TaskRecord): TaskProgress {
  return {
    taskId: record.id,
    current: record.current,
    status: record.status,
    percentage: calculatePercentage(record),
    ...(record.error === undefined ? {} : { error: record.error }),
  };
}
