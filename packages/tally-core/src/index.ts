export {
  Tally,
  type CancelAcknowledgement,
  type CancelOutcome,
  type SubmitTaskInput,
  type TallyConfiguration,
} from './tally';
export { TallyEvents, type TallyEventsMap } from './events';
export {
  ExecutorEvents,
  type AbandonedReason,
  type ExecutorConfiguration,
  type ExecutorEventsMap,
  type SupersededReason,
} from './executor';
export {
  SweeperEvents,
  defaultSweepRules,
  type ArtifactReleaser,
  type SweepResult,
  type SweepRule,
  type SweeperConfiguration,
  type SweeperEventsMap,
} from './sweeper';
export type { PluginContext, TallyPlugin } from './plugins/plugin';

export { CancellationCoordinator } from './cancellation';
export { TaskRegistry, type TaskHandle } from './registry';
export { calculatePercentage, toProgress, type PercentageInput, type TaskProgress } from './progress';
export { isTerminalStatus, isTransitionAllowed, TERMINAL_STATUSES } from './state-machine';
export {
  TallyError,
  CapacityExceededError,
  InvalidRangeError,
  InvalidTransitionError,
  TaskNotFoundError,
  VersionConflictError,
} from './errors';

export {
  TaskStatus,
  type CompareAndSwapResult,
  type CreateTaskInput,
  type Datastore,
  type DeleteOptions,
  type FindByStatusOlderThanInput,
  type TaskRecord,
  type TaskUpdate,
  type TimestampField,
} from './datastore';
