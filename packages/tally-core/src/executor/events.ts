import type { TaskRecord } from '../datastore';

export const ExecutorEvents = {
  /** A task has been claimed by a worker and moved to RUNNING */
  TASK_CLAIMED: 'taskClaimed',
  /** In-memory progress of a running task has been written to the datastore */
  TASK_PROGRESS_FLUSHED: 'taskProgressFlushed',
  /** A task reached the end of its range and has been marked as COMPLETED */
  TASK_COMPLETED: 'taskCompleted',
  /** A task observed its cancellation signal and has been marked as CANCELLED */
  TASK_CANCELLED: 'taskCancelled',
  /** A task hit an unexpected error and has been marked as FAILED */
  TASK_FAILED: 'taskFailed',
  /** A running task was interrupted by shutdown. Its progress was flushed and it stays RUNNING for recovery */
  TASK_INTERRUPTED: 'taskInterrupted',
  /** Another actor deleted the task or moved it to a terminal status while it was running */
  TASK_SUPERSEDED: 'taskSuperseded',
  /** A dequeued task was not claimed because it was missing, terminal or owned by a live worker */
  TASK_ABANDONED: 'taskAbandoned',
  /** An orphaned task found in the datastore has been queued again */
  TASK_RECOVERED: 'taskRecovered',
  /** An unknown and uncaught exception occurred in the executor */
  UNKNOWN_PROCESSING_ERROR: 'unknownProcessingError',
} as const;

export type ExecutorEvents = (typeof ExecutorEvents)[keyof typeof ExecutorEvents];

export type SupersededReason = 'deleted' | 'terminal';

export type AbandonedReason = 'missing' | 'terminal' | 'claimed-elsewhere' | 'claim-conflict';

export type ExecutorEventsMap = {
  [ExecutorEvents.TASK_CLAIMED]: [{ task: TaskRecord; claimedAt: Date }];
  [ExecutorEvents.TASK_PROGRESS_FLUSHED]: [{ task: TaskRecord; flushedAt: Date }];
  [ExecutorEvents.TASK_COMPLETED]: [{ task: TaskRecord; completedAt: Date }];
  [ExecutorEvents.TASK_CANCELLED]: [{ task: TaskRecord; cancelledAt: Date }];
  [ExecutorEvents.TASK_FAILED]: [{ task: TaskRecord; error: unknown; failedAt: Date }];
  [ExecutorEvents.TASK_INTERRUPTED]: [{ task: TaskRecord; interruptedAt: Date }];
  [ExecutorEvents.TASK_SUPERSEDED]: [{ taskId: string; reason: SupersededReason; task?: TaskRecord }];
  [ExecutorEvents.TASK_ABANDONED]: [{ taskId: string; reason: AbandonedReason }];
  [ExecutorEvents.TASK_RECOVERED]: [{ task: TaskRecord; recoveredAt: Date }];
  [ExecutorEvents.UNKNOWN_PROCESSING_ERROR]: [{ error: unknown; taskId?: string; timestamp: Date }];
};
