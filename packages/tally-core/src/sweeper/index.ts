import type { EventEmitter } from 'node:events';
import type { TaskRecord, TaskStatus, TimestampField } from '../datastore';

/**
 * Releases the external artifacts (files, exports) produced for a task. Must be idempotent:
 * missing artifacts are not an error.
 */
export interface ArtifactReleaser {
  releaseArtifacts(taskId: string): Promise<void>;
}

/**
 * One staleness criterion. Records in one of `statuses` whose `timestampField` is older than
 * `maxAgeMs` are deleted.
 */
export type SweepRule = {
  name: string;
  statuses: TaskStatus[];
  timestampField: TimestampField;
  maxAgeMs: number;
  /** Called once for every record this rule deletes */
  artifactReleaser?: ArtifactReleaser;
};

export type SweepResult = {
  deleted: number;
  artifactsReleased: number;
};

export interface StalenessSweeper extends EventEmitter<SweeperEventsMap> {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Runs a single pass over every rule. */
  sweep(): Promise<SweepResult>;
}

export const SweeperEvents = {
  /** A stale task has been deleted from the datastore */
  TASK_SWEPT: 'taskSwept',
  /** The artifact releaser threw for a deleted task */
  ARTIFACT_RELEASE_FAILED: 'artifactReleaseFailed',
  /** A sweep pass has finished */
  SWEEP_COMPLETED: 'sweepCompleted',
  /** A sweep pass has been aborted by an error */
  SWEEP_FAILED: 'sweepFailed',
} as const;

export type SweeperEvents = (typeof SweeperEvents)[keyof typeof SweeperEvents];

export type SweeperEventsMap = {
  [SweeperEvents.TASK_SWEPT]: [{ task: TaskRecord; rule: string; sweptAt: Date }];
  [SweeperEvents.ARTIFACT_RELEASE_FAILED]: [{ taskId: string; rule: string; error: unknown; timestamp: Date }];
  [SweeperEvents.SWEEP_COMPLETED]: [{ result: SweepResult; timestamp: Date }];
  [SweeperEvents.SWEEP_FAILED]: [{ error: unknown; timestamp: Date }];
};

export { createSweeper, type CreateSweeperInput, defaultSweepRules, type SweeperConfiguration } from './create-sweeper';
export { SimpleSweeper, type SimpleSweeperConfiguration } from './simple-sweeper';
