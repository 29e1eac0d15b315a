import type { CancellationCoordinator } from '../cancellation';
import type { Datastore } from '../datastore';
import type { TaskHandle, TaskRegistry } from '../registry';
import type { TaskExecutor } from './executor';
import { PoolExecutor } from './pool-executor';

/**
 * Configuration for the executor.
 */
export type ExecutorConfiguration = {
  /** The number of workers, i.e. the maximum number of tasks running at once. @default 4 */
  maxConcurrency?: number;
  /** The maximum number of tasks waiting for a free worker before submissions are rejected. @default 100 */
  maxQueueSize?: number;
  /** The interval between two advances of a task's counter. @default 1000ms */
  tickIntervalMs?: number;
  /** Progress is written to the datastore at least once every this many ticks. @default 10 */
  flushEveryTicks?: number;
  /** Progress is written to the datastore at least this often. @default 5000ms */
  flushIntervalMs?: number;
  /** A RUNNING record untouched for this long is considered orphaned and may be claimed again. @default 30000ms */
  claimStaleTimeoutMs?: number;
  /** The interval between two scans of the datastore for orphaned tasks. @default 30000ms */
  recoveryIntervalMs?: number;
  /** How many times a write is retried after a version conflict before the task fails. @default 3 */
  maxConflictRetries?: number;
};

export type CreateExecutorInput<DatastoreOptions> = {
  datastore: Datastore<DatastoreOptions>;
  registry: TaskRegistry<TaskHandle>;
  cancellation: CancellationCoordinator;
  configuration?: ExecutorConfiguration;
};

export function createExecutor<DatastoreOptions>(input: CreateExecutorInput<DatastoreOptions>): TaskExecutor {
  // add more executors here
  return new PoolExecutor<DatastoreOptions>(input);
}
