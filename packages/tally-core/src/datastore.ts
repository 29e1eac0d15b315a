export const TaskStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  CANCELLED: 'CANCELLED',
  FAILED: 'FAILED',
} as const;
export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export type TaskRecord = {
  /** A unique identifier for the task, assigned by the datastore */
  id: string;
  /** The first value of the inclusive counting range */
  x: number;
  /** The last value of the inclusive counting range */
  y: number;
  /** The position of the counter, starting at `x` and never decreasing */
  current: number;
  /** The current status of the task */
  status: TaskStatus;
  /** The date the task was created */
  createdAt: Date;
  /** The date of the last persisted change */
  updatedAt: Date;
  /** Incremented by the datastore on every successful compare-and-swap */
  version: number;
  /** The date the task was first claimed by a worker */
  startedAt?: Date;
  /** The date the task reached a terminal status */
  finishedAt?: Date;
  /** The message of the error that moved the task to FAILED */
  error?: string;
};

export type CreateTaskInput<DatastoreOptions> = {
  x: number;
  y: number;
  /** Additional options for the datastore to use when creating the task. Can include things like a session for database transactions. Unique per datastore implementation.*/
  datastoreOptions?: DatastoreOptions;
};

/**
 * The fields a compare-and-swap writes. Optional fields left undefined keep their stored value.
 */
export type TaskUpdate = {
  id: string;
  status: TaskStatus;
  current: number;
  startedAt?: Date;
  finishedAt?: Date;
  error?: string;
};

export type CompareAndSwapResult = { swapped: true; record: TaskRecord } | { swapped: false };

export type TimestampField = 'createdAt' | 'updatedAt';

export type FindByStatusOlderThanInput = {
  status: TaskStatus;
  /** Which timestamp the age is measured on */
  timestampField: TimestampField;
  /** Only records whose timestamp is strictly earlier than this date are returned */
  olderThan: Date;
  limit?: number;
};

export type DeleteOptions = {
  /** When set, the record is only deleted if its version still matches */
  expectedVersion?: number;
};

export interface Datastore<DatastoreOptions> {
  create(input: CreateTaskInput<DatastoreOptions>): Promise<TaskRecord>;
  loadById(taskId: string): Promise<TaskRecord | undefined>;
  compareAndSwap(update: TaskUpdate, expectedVersion: number): Promise<CompareAndSwapResult>;
  findByStatusOlderThan(input: FindByStatusOlderThanInput): Promise<TaskRecord[]>;
  delete(taskId: string, options?: DeleteOptions): Promise<TaskRecord | undefined>;
}
