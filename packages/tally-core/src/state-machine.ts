import { TaskStatus } from './datastore';

export const TERMINAL_STATUSES: readonly TaskStatus[] = [TaskStatus.COMPLETED, TaskStatus.CANCELLED, TaskStatus.FAILED];

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isTransitionAllowed(from: TaskStatus, to: TaskStatus): boolean {
  switch (from) {
    case TaskStatus.CREATED:
      return to === TaskStatus.RUNNING || to === TaskStatus.CANCELLED;
    case TaskStatus.RUNNING:
      return to !== TaskStatus.CREATED;
    case TaskStatus.COMPLETED:
    case TaskStatus.CANCELLED:
    case TaskStatus.FAILED:
      return false;
    default: {
      const _exhaustiveCheck: never = from;
      throw new Error('Unknown task status');
    }
  }
}
