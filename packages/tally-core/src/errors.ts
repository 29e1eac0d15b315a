import type { TaskStatus } from './datastore';

export class TallyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The submitted range is not a valid counting range. Nothing is persisted. */
export class InvalidRangeError extends TallyError {
  constructor(
    readonly x: number,
    readonly y: number,
    reason: string,
  ) {
    super(`Invalid range [${x}, ${y}]: ${reason}`);
  }
}

export class TaskNotFoundError extends TallyError {
  constructor(readonly taskId: string) {
    super(`Task with id ${taskId} not found`);
  }
}

/**
 * A compare-and-swap kept conflicting after reconciliation. Raised inside a worker, or by
 * cancel when the record changes on every attempt.
 */
export class VersionConflictError extends TallyError {
  constructor(
    readonly taskId: string,
    readonly expectedVersion: number,
  ) {
    super(`Task with id ${taskId} kept changing while writing version ${expectedVersion}`);
  }
}

/** The worker pool and its queue are full. */
export class CapacityExceededError extends TallyError {
  constructor(readonly limit: number) {
    super(`Task capacity of ${limit} reached, submission rejected`);
  }
}

export class InvalidTransitionError extends TallyError {
  constructor(
    readonly from: TaskStatus,
    readonly to: TaskStatus,
  ) {
    super(`Task can not move from ${from} to ${to}`);
  }
}
