import { EventEmitter } from 'node:events';
import type { CancellationCoordinator } from '../cancellation';
import { type Datastore, type TaskRecord, TaskStatus } from '../datastore';
import { CapacityExceededError, InvalidTransitionError, VersionConflictError } from '../errors';
import type { TaskHandle, TaskRegistry } from '../registry';
import { isTerminalStatus, isTransitionAllowed } from '../state-machine';
import { delay } from '../utils/promise-utils';
import { type AbandonedReason, ExecutorEvents, type ExecutorEventsMap, type SupersededReason } from './events';
import type { Reservation, TaskExecutor } from './executor';
import { RunningTask } from './running-task';
import { WorkQueue } from './work-queue';

export const DEFAULT_MAX_CONCURRENCY = 4;

const DEFAULT_CONFIG: PoolExecutorConfig = {
  maxConcurrency: DEFAULT_MAX_CONCURRENCY,
  maxQueueSize: 100,
  tickIntervalMs: 1_000,
  flushEveryTicks: 10,
  flushIntervalMs: 5_000,
  claimStaleTimeoutMs: 30_000,
  recoveryIntervalMs: 30_000,
  maxConflictRetries: 3,
};

export type PoolExecutorConfig = {
  /** The number of workers, i.e. the maximum number of tasks running at once. @default 4 */
  maxConcurrency: number;
  /** The maximum number of tasks waiting for a free worker. @default 100 */
  maxQueueSize: number;
  /** The interval between two advances of a task's counter. @default 1000ms */
  tickIntervalMs: number;
  /** Progress is written to the datastore at least once every this many ticks. @default 10 */
  flushEveryTicks: number;
  /** Progress is written to the datastore at least this often. @default 5000ms */
  flushIntervalMs: number;
  /** A RUNNING record untouched for this long is considered orphaned and may be claimed again. @default 30000ms */
  claimStaleTimeoutMs: number;
  /** The interval between two scans of the datastore for orphaned tasks. @default 30000ms */
  recoveryIntervalMs: number;
  /** How many times a write is retried after a version conflict before the task fails. @default 3 */
  maxConflictRetries: number;
};

export type PoolExecutorInput<DatastoreOptions> = {
  datastore: Datastore<DatastoreOptions>;
  registry: TaskRegistry<TaskHandle>;
  cancellation: CancellationCoordinator;
  configuration?: Partial<PoolExecutorConfig>;
};

type WriteOutcome =
  | { kind: 'written'; record: TaskRecord }
  | { kind: 'superseded'; reason: SupersededReason; record?: TaskRecord };

type WritePatch = {
  status: TaskStatus;
  finishedAt?: Date;
  error?: string;
};

const InternalExecutorEvents = { LOOP_EXIT: 'loopExit' } as const;

type InternalExecutorEventsMap = {
  [InternalExecutorEvents.LOOP_EXIT]: [];
};

export class PoolExecutor<DatastoreOptions>
  extends EventEmitter<ExecutorEventsMap>
  implements TaskExecutor
{
  private readonly config: PoolExecutorConfig;
  private readonly datastore: Datastore<DatastoreOptions>;
  private readonly registry: TaskRegistry<TaskHandle>;
  private readonly cancellation: CancellationCoordinator;
  private readonly queue = new WorkQueue();
  private readonly shutdown = new AbortController();
  private exitChannels: EventEmitter<InternalExecutorEventsMap>[] = [];
  private stopRequested = false;
  private stopping: Promise<void> | undefined;
  private liveWorkers = 0;
  private reserved = 0;

  constructor(input: PoolExecutorInput<DatastoreOptions>) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...input.configuration };
    this.datastore = input.datastore;
    this.registry = input.registry;
    this.cancellation = input.cancellation;
    this.validateConfig();
  }

  /**
   * Validates that every setting is a positive integer and that a live task flushes often enough
   * never to look orphaned.
   *
   * @throws {Error} If a setting is invalid.
   */
  private validateConfig() {
    for (const [key, value] of Object.entries(this.config)) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${key} must be a positive integer, received ${value}`);
      }
    }

    const { flushIntervalMs, tickIntervalMs, claimStaleTimeoutMs } = this.config;

    if (flushIntervalMs + tickIntervalMs >= claimStaleTimeoutMs) {
      throw new Error(
        `Flush interval (${flushIntervalMs}ms) plus tick interval (${tickIntervalMs}ms) must be less than the claim stale timeout (${claimStaleTimeoutMs}ms)`,
      );
    }
  }

  /** The number of tasks the pool and its queue hold at most. */
  get capacity(): number {
    return this.config.maxConcurrency + this.config.maxQueueSize;
  }

  /**
   * The number of tasks running, queued or reserved. A worker counts as busy from the moment an
   * id is handed to it.
   */
  get pending(): number {
    return this.liveWorkers - this.queue.idleTakers + this.queue.length + this.reserved;
  }

  hasCapacity(): boolean {
    return this.pending < this.capacity;
  }

  reserve(): Reservation {
    if (!this.hasCapacity()) {
      throw new CapacityExceededError(this.capacity);
    }

    this.reserved += 1;
    let settled = false;

    const settle = (): boolean => {
      if (settled) {
        return false;
      }

      settled = true;
      this.reserved -= 1;

      return true;
    };

    return {
      fill: (taskId) => {
        if (settle()) {
          this.enqueue(taskId);
        }
      },
      release: () => {
        settle();
      },
    };
  }

  /**
   * Starts `maxConcurrency` worker loops and the recovery loop.
   */
  async start(): Promise<void> {
    if (this.stopRequested || this.exitChannels.length > 0) return;

    for (let i = 0; i < this.config.maxConcurrency; i++) {
      const exitChannel = new EventEmitter<InternalExecutorEventsMap>();
      this.exitChannels.push(exitChannel);
      void this.runWorkerLoop(exitChannel);
    }

    const recoveryExitChannel = new EventEmitter<InternalExecutorEventsMap>();
    this.exitChannels.push(recoveryExitChannel);
    void this.runRecoveryLoop(recoveryExitChannel);
  }

  /**
   * Signals every loop to exit and interrupts running tasks at their current tick, then waits
   * for all loops to finish. Queued tasks stay CREATED in the datastore for recovery.
   */
  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stopLoops();
    }

    return this.stopping;
  }

  private async stopLoops(): Promise<void> {
    const exitPromises = this.exitChannels.map(
      (channel) => new Promise((resolve) => channel.once(InternalExecutorEvents.LOOP_EXIT, () => resolve(null))),
    );
    this.stopRequested = true;
    this.shutdown.abort();

    await Promise.all(exitPromises);

    for (const taskId of this.queue.drain()) {
      this.cancellation.release(taskId);
    }
  }

  async recover(): Promise<number> {
    const available = this.capacity - this.pending;

    if (this.stopRequested || available <= 0) {
      return 0;
    }

    const olderThan = new Date(Date.now() - this.config.claimStaleTimeoutMs);
    const unstarted = await this.datastore.findByStatusOlderThan({
      status: TaskStatus.CREATED,
      timestampField: 'createdAt',
      olderThan,
      limit: available,
    });
    const orphaned = await this.datastore.findByStatusOlderThan({
      status: TaskStatus.RUNNING,
      timestampField: 'updatedAt',
      olderThan,
      limit: available,
    });

    let recovered = 0;

    for (const record of [...unstarted, ...orphaned]) {
      if (this.cancellation.has(record.id) || !this.hasCapacity()) {
        continue;
      }

      this.cancellation.register(record.id);
      this.enqueue(record.id);
      recovered += 1;

      this.emit(ExecutorEvents.TASK_RECOVERED, { task: record, recoveredAt: new Date() });
    }

    return recovered;
  }

  private enqueue(taskId: string): void {
    if (this.stopRequested) {
      this.cancellation.release(taskId);
      return;
    }

    this.queue.push(taskId);
  }

  private async runWorkerLoop(exitChannel: EventEmitter<InternalExecutorEventsMap>): Promise<void> {
    this.liveWorkers += 1;

    while (!this.stopRequested) {
      const taskId = await this.queue.take(this.shutdown.signal);

      if (taskId === undefined) {
        break;
      }

      try {
        await this.processTask(taskId);
      } catch (error) {
        this.emit(ExecutorEvents.UNKNOWN_PROCESSING_ERROR, { error, taskId, timestamp: new Date() });
      }
    }

    this.liveWorkers -= 1;

    exitChannel.emit(InternalExecutorEvents.LOOP_EXIT);
  }

  private async runRecoveryLoop(exitChannel: EventEmitter<InternalExecutorEventsMap>): Promise<void> {
    while (!this.stopRequested) {
      try {
        await this.recover();
      } catch (error) {
        this.emit(ExecutorEvents.UNKNOWN_PROCESSING_ERROR, { error, timestamp: new Date() });
      }

      await delay(this.config.recoveryIntervalMs, this.shutdown.signal);
    }

    exitChannel.emit(InternalExecutorEvents.LOOP_EXIT);
  }

  /**
   * Loads, claims and runs one task. The cancellation signal and the registry entry are
   * released here, once, whatever way the task ends.
   */
  private async processTask(taskId: string): Promise<void> {
    const cancelSignal = this.cancellation.register(taskId);

    try {
      const record = await this.datastore.loadById(taskId);

      if (!record) {
        this.abandon(taskId, 'missing');
        return;
      }

      if (isTerminalStatus(record.status)) {
        this.abandon(taskId, 'terminal');
        return;
      }

      const task = new RunningTask(record, cancelSignal, this.shutdown.signal, () =>
        this.cancellation.signalCancel(taskId),
      );

      try {
        if (record.status === TaskStatus.RUNNING && !this.isStale(record)) {
          this.abandon(taskId, 'claimed-elsewhere');
          return;
        }

        if (task.cancelRequested) {
          await this.finish(task, TaskStatus.CANCELLED);
          return;
        }

        if (!(await this.claim(task))) {
          this.abandon(taskId, 'claim-conflict');
          return;
        }

        this.registry.add(task);

        try {
          await this.runTicks(task);
        } finally {
          this.registry.remove(taskId);
        }
      } finally {
        task.dispose();
      }
    } finally {
      this.cancellation.release(taskId);
    }
  }

  private async claim(task: RunningTask): Promise<boolean> {
    if (!isTransitionAllowed(task.status, TaskStatus.RUNNING)) {
      throw new InvalidTransitionError(task.status, TaskStatus.RUNNING);
    }

    const claimedAt = new Date();
    const result = await this.datastore.compareAndSwap(
      {
        id: task.taskId,
        status: TaskStatus.RUNNING,
        current: task.current,
        startedAt: task.startedAt ?? claimedAt,
      },
      task.version,
    );

    if (!result.swapped) {
      return false;
    }

    task.adopt(result.record);
    this.emit(ExecutorEvents.TASK_CLAIMED, { task: result.record, claimedAt });

    return true;
  }

  /**
   * Advances the task once per tick until it completes, is cancelled, is superseded or the
   * executor shuts down. Cancellation is checked before every advance.
   */
  private async runTicks(task: RunningTask): Promise<void> {
    let ticksSinceFlush = 0;
    let lastFlushAt = Date.now();

    try {
      while (true) {
        await delay(this.config.tickIntervalMs, task.signal);

        if (task.cancelRequested) {
          await this.finish(task, TaskStatus.CANCELLED);
          return;
        }

        if (task.shutdownRequested) {
          await this.interrupt(task);
          return;
        }

        task.advance();

        if (task.finished) {
          await this.finish(task, TaskStatus.COMPLETED);
          return;
        }

        ticksSinceFlush += 1;

        if (ticksSinceFlush >= this.config.flushEveryTicks || Date.now() - lastFlushAt >= this.config.flushIntervalMs) {
          const outcome = await this.write(task, { status: TaskStatus.RUNNING });

          if (outcome.kind === 'superseded') {
            this.supersede(task.taskId, outcome);
            return;
          }

          ticksSinceFlush = 0;
          lastFlushAt = Date.now();
          this.emit(ExecutorEvents.TASK_PROGRESS_FLUSHED, { task: outcome.record, flushedAt: new Date() });
        }
      }
    } catch (error) {
      await this.fail(task, error);
    }
  }

  private async finish(task: RunningTask, status: typeof TaskStatus.COMPLETED | typeof TaskStatus.CANCELLED) {
    const finishedAt = new Date();
    const outcome = await this.write(task, { status, finishedAt });

    if (outcome.kind === 'superseded') {
      this.supersede(task.taskId, outcome);
      return;
    }

    if (status === TaskStatus.COMPLETED) {
      this.emit(ExecutorEvents.TASK_COMPLETED, { task: outcome.record, completedAt: finishedAt });
    } else {
      this.emit(ExecutorEvents.TASK_CANCELLED, { task: outcome.record, cancelledAt: finishedAt });
    }
  }

  private async interrupt(task: RunningTask): Promise<void> {
    const outcome = await this.write(task, { status: TaskStatus.RUNNING });

    if (outcome.kind === 'superseded') {
      this.supersede(task.taskId, outcome);
      return;
    }

    this.emit(ExecutorEvents.TASK_INTERRUPTED, { task: outcome.record, interruptedAt: new Date() });
  }

  /**
   * Records the error on the task as FAILED. If even that write fails the task stays RUNNING
   * and is picked up again once it looks orphaned.
   */
  private async fail(task: RunningTask, error: unknown): Promise<void> {
    const failedAt = new Date();

    try {
      const outcome = await this.write(task, {
        status: TaskStatus.FAILED,
        finishedAt: failedAt,
        error: error instanceof Error ? error.message : String(error),
      });

      if (outcome.kind === 'superseded') {
        this.supersede(task.taskId, outcome);
        return;
      }

      this.emit(ExecutorEvents.TASK_FAILED, { task: outcome.record, error, failedAt });
    } catch (writeError) {
      this.emit(ExecutorEvents.UNKNOWN_PROCESSING_ERROR, {
        error: writeError,
        taskId: task.taskId,
        timestamp: new Date(),
      });
    }
  }

  /**
   * Writes the task's in-memory state with compare-and-swap. On a conflict the record is
   * reloaded: a terminal status or a deletion already in the datastore wins, anything else is
   * adopted and the write retried.
   */
  private async write(task: RunningTask, patch: WritePatch): Promise<WriteOutcome> {
    if (!isTransitionAllowed(task.status, patch.status)) {
      throw new InvalidTransitionError(task.status, patch.status);
    }

    for (let attempt = 0; attempt <= this.config.maxConflictRetries; attempt++) {
      const result = await this.datastore.compareAndSwap(
        {
          id: task.taskId,
          status: patch.status,
          current: task.current,
          startedAt: task.startedAt,
          finishedAt: patch.finishedAt,
          error: patch.error,
        },
        task.version,
      );

      if (result.swapped) {
        task.adopt(result.record);
        return { kind: 'written', record: result.record };
      }

      const latest = await this.datastore.loadById(task.taskId);

      if (!latest) {
        return { kind: 'superseded', reason: 'deleted' };
      }

      task.adopt(latest);

      if (isTerminalStatus(latest.status)) {
        return { kind: 'superseded', reason: 'terminal', record: latest };
      }
    }

    throw new VersionConflictError(task.taskId, task.version);
  }

  private isStale(record: TaskRecord): boolean {
    return record.updatedAt.getTime() <= Date.now() - this.config.claimStaleTimeoutMs;
  }

  private abandon(taskId: string, reason: AbandonedReason): void {
    this.emit(ExecutorEvents.TASK_ABANDONED, { taskId, reason });
  }

  private supersede(taskId: string, outcome: { reason: SupersededReason; record?: TaskRecord }): void {
    this.emit(ExecutorEvents.TASK_SUPERSEDED, { taskId, reason: outcome.reason, task: outcome.record });
  }
}
