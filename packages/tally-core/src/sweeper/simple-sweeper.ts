import EventEmitter from 'node:events';

import type { Datastore } from '../datastore';
import { delay } from '../utils/promise-utils';
import { type StalenessSweeper, SweeperEvents, type SweeperEventsMap, type SweepResult, type SweepRule } from '.';

const DEFAULT_CONFIG: Required<SimpleSweeperConfiguration> = {
  sweepIntervalMs: 60_000,
  batchSize: 100,
};

export interface SimpleSweeperConfiguration {
  /** The interval between two sweep passes. @default 60_000ms */
  sweepIntervalMs?: number;
  /** The maximum number of records fetched per rule and status in one pass. @default 100 */
  batchSize?: number;
}

export interface SimpleSweeperInput<DatastoreOptions> {
  datastore: Datastore<DatastoreOptions>;
  rules: SweepRule[];
  configuration?: SimpleSweeperConfiguration;
}

export class SimpleSweeper<DatastoreOptions>
  extends EventEmitter<SweeperEventsMap>
  implements StalenessSweeper
{
  private config: Required<SimpleSweeperConfiguration>;
  private datastore: Datastore<DatastoreOptions>;
  private rules: SweepRule[];
  private interval: { abortController: AbortController; promise: Promise<void> } | undefined;

  constructor(input: SimpleSweeperInput<DatastoreOptions>) {
    super();

    this.config = {
      ...DEFAULT_CONFIG,
      ...input.configuration,
    };

    this.datastore = input.datastore;
    this.rules = input.rules;
    this.validateConfig();
  }

  /**
   * @throws {Error} If an interval, the batch size or a rule's age is not a positive integer.
   */
  private validateConfig() {
    const { sweepIntervalMs, batchSize } = this.config;

    for (const [key, value] of Object.entries({ sweepIntervalMs, batchSize })) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${key} must be a positive integer, received ${value}`);
      }
    }

    for (const rule of this.rules) {
      if (!Number.isInteger(rule.maxAgeMs) || rule.maxAgeMs <= 0) {
        throw new Error(`Sweep rule "${rule.name}" maxAgeMs must be a positive integer, received ${rule.maxAgeMs}`);
      }
    }
  }

  async start(): Promise<void> {
    if (this.interval) {
      return;
    }

    const abortController = new AbortController();
    const promise = this.runSweepLoop(abortController.signal);

    this.interval = { abortController, promise };
  }

  async stop(): Promise<void> {
    if (!this.interval) {
      return;
    }

    this.interval.abortController.abort();
    await this.interval.promise;
    this.interval = undefined;
  }

  async sweep(): Promise<SweepResult> {
    const now = Date.now();
    const result: SweepResult = { deleted: 0, artifactsReleased: 0 };

    for (const rule of this.rules) {
      const olderThan = new Date(now - rule.maxAgeMs);

      for (const status of rule.statuses) {
        const candidates = await this.datastore.findByStatusOlderThan({
          status,
          timestampField: rule.timestampField,
          olderThan,
          limit: this.config.batchSize,
        });

        for (const candidate of candidates) {
          // the version guard skips records claimed or finished since the scan
          const deleted = await this.datastore.delete(candidate.id, { expectedVersion: candidate.version });

          if (!deleted) {
            continue;
          }

          result.deleted += 1;
          this.emit(SweeperEvents.TASK_SWEPT, { task: deleted, rule: rule.name, sweptAt: new Date() });

          if (rule.artifactReleaser && (await this.releaseArtifacts(rule, deleted.id))) {
            result.artifactsReleased += 1;
          }
        }
      }
    }

    this.emit(SweeperEvents.SWEEP_COMPLETED, { result, timestamp: new Date() });

    return result;
  }

  private async releaseArtifacts(rule: SweepRule, taskId: string): Promise<boolean> {
    try {
      await rule.artifactReleaser?.releaseArtifacts(taskId);
      return true;
    } catch (error) {
      this.emit(SweeperEvents.ARTIFACT_RELEASE_FAILED, { taskId, rule: rule.name, error, timestamp: new Date() });
      return false;
    }
  }

  private async runSweepLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await delay(this.config.sweepIntervalMs, signal);

      if (signal.aborted) {
        return;
      }

      try {
        await this.sweep();
      } catch (error) {
        this.emit(SweeperEvents.SWEEP_FAILED, { error, timestamp: new Date() });
      }
    }
  }
}
