export { createExecutor, type CreateExecutorInput, type ExecutorConfiguration } from './create-executor';
export {
  type AbandonedReason,
  ExecutorEvents,
  type ExecutorEventsMap,
  type SupersededReason,
} from './events';
export type { Reservation, TaskExecutor } from './executor';
export { DEFAULT_MAX_CONCURRENCY, PoolExecutor, type PoolExecutorConfig } from './pool-executor';
export { RunningTask } from './running-task';
