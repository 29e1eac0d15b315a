import { EventEmitter } from 'node:events';

import { CancellationCoordinator } from './cancellation';
import { type CreateTaskInput, type Datastore, TaskStatus } from './datastore';
import { InvalidRangeError, TaskNotFoundError, VersionConflictError } from './errors';
import { TallyEvents, type TallyEventsMap } from './events';
import {
  createExecutor,
  DEFAULT_MAX_CONCURRENCY,
  type ExecutorConfiguration,
  type ExecutorEventsMap,
  type TaskExecutor,
} from './executor';
import type { TallyPlugin } from './plugins/plugin';
import { TallyPluginContext } from './plugins/plugin-context';
import { type TaskProgress, toProgress } from './progress';
import { TaskRegistry } from './registry';
import { isTerminalStatus } from './state-machine';
import {
  createSweeper,
  type StalenessSweeper,
  type SweeperConfiguration,
  SweeperEvents,
  type SweeperEventsMap,
} from './sweeper';
import { promiseWithTimeout } from './utils/promise-utils';
import { RecentlyDeleted } from './utils/recently-deleted';

export type TallyConfiguration = {
  /** The largest accepted `y - x`. @default 100_000 */
  maxRangeSpan?: number;
  /** How many ids removed by the sweeper are remembered to answer cancel requests. @default 10_000 */
  recentlyDeletedCapacity?: number;
  executor?: ExecutorConfiguration;
  sweeper?: SweeperConfiguration;
};

export type SubmitTaskInput<DatastoreOptions> = CreateTaskInput<DatastoreOptions>;

export type CancelOutcome =
  /** The task is running in this process and will stop at its next tick */
  | 'signalled'
  /** The task had already completed, been cancelled or failed; nothing changed */
  | 'already-terminal'
  /** The task was queued or not running anywhere and has been moved to CANCELLED directly */
  | 'cancelled'
  /** The task has recently been removed by the sweeper */
  | 'already-deleted';

export type CancelAcknowledgement = {
  taskId: string;
  outcome: CancelOutcome;
};

const DEFAULT_MAX_RANGE_SPAN = 100_000;
const DEFAULT_RECENTLY_DELETED_CAPACITY = 10_000;
const MAX_CANCEL_ATTEMPTS = 5;

/**
 * The main class for submitting, observing and cancelling counting tasks.
 * @param datastore - The datastore instance to use for storing and retrieving tasks.
 * @param configuration - Optional limits and settings for the executor and the sweeper.
 * @returns The Tally instance that can be used to start and stop the engine as well as receive tally instance events.
 */
export class Tally<DatastoreOptions> extends EventEmitter<TallyEventsMap> {
  private readonly datastore: Datastore<DatastoreOptions>;
  private readonly cancellation = new CancellationCoordinator();
  private readonly registry: TaskRegistry;
  private readonly executor: TaskExecutor;
  private readonly sweeper: StalenessSweeper;
  private readonly recentlyDeleted: RecentlyDeleted;
  private readonly pluginContext: TallyPluginContext<DatastoreOptions>;
  private readonly pluginNames = new Set<string>();
  private readonly maxRangeSpan: number;
  private started = false;

  readonly exitTimeoutMs = 60_000;

  constructor(datastore: Datastore<DatastoreOptions>, configuration: TallyConfiguration = {}) {
    super();

    this.datastore = datastore;
    this.maxRangeSpan = configuration.maxRangeSpan ?? DEFAULT_MAX_RANGE_SPAN;

    const recentlyDeletedCapacity = configuration.recentlyDeletedCapacity ?? DEFAULT_RECENTLY_DELETED_CAPACITY;

    for (const [key, value] of Object.entries({ maxRangeSpan: this.maxRangeSpan, recentlyDeletedCapacity })) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${key} must be a positive integer, received ${value}`);
      }
    }

    this.recentlyDeleted = new RecentlyDeleted(recentlyDeletedCapacity);
    this.registry = new TaskRegistry(configuration.executor?.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.executor = createExecutor({
      datastore,
      registry: this.registry,
      cancellation: this.cancellation,
      configuration: configuration.executor,
    });
    this.sweeper = createSweeper({ datastore, configuration: configuration.sweeper });
    this.sweeper.on(SweeperEvents.TASK_SWEPT, ({ task }) => this.recentlyDeleted.add(task.id));

    this.pluginContext = new TallyPluginContext({
      tallyEvents: this,
      executorEvents: this.executor,
      sweeperEvents: this.sweeper,
      datastore,
      registry: this.registry,
    });
  }

  public async start(): Promise<void> {
    if (this.started) {
      return;
    }

    this.started = true;

    await this.pluginContext.executeStartHooks();
    await this.executor.start();
    await this.sweeper.start();

    this.emit(TallyEvents.STARTED, { startedAt: new Date() });
  }

  /**
   * Stops the sweeper, then the executor, then runs the plugin stop hooks. Running tasks are
   * interrupted at their current tick and stay RUNNING for a later recovery.
   */
  public async stop(): Promise<void> {
    const stopPromise = (async () => {
      await this.sweeper.stop();
      await this.executor.stop();
      await this.pluginContext.executeStopHooks();
    })();

    try {
      await promiseWithTimeout(stopPromise, this.exitTimeoutMs);
      this.emit(TallyEvents.STOPPED, { stoppedAt: new Date() });
    } catch (error) {
      this.emit(TallyEvents.STOP_ABORTED, { error, timestamp: new Date() });
    }
  }

  /**
   * Registers a plugin. Must be called before start().
   * @returns The plugin's public API
   */
  public use<API>(plugin: TallyPlugin<API>): API {
    if (this.started) {
      throw new Error(`Cannot register plugin "${plugin.name}" after Tally has started`);
    }

    if (this.pluginNames.has(plugin.name)) {
      throw new Error(`Plugin "${plugin.name}" is already registered`);
    }

    this.pluginNames.add(plugin.name);

    return plugin.register(this.pluginContext);
  }

  /**
   * Creates a task counting from `x` to `y` and queues it for execution.
   *
   * @throws {InvalidRangeError} If the bounds are not integers, `y < x`, or the span is too large. No record is created.
   * @throws {CapacityExceededError} If every worker is busy and the queue is full.
   * @returns The id of the created task.
   */
  public async submit(input: SubmitTaskInput<DatastoreOptions>): Promise<string> {
    const { x, y } = input;

    if (!Number.isInteger(x) || !Number.isInteger(y)) {
      throw new InvalidRangeError(x, y, 'bounds must be integers');
    }

    if (y < x) {
      throw new InvalidRangeError(x, y, 'y must be greater than or equal to x');
    }

    if (y - x > this.maxRangeSpan) {
      throw new InvalidRangeError(x, y, `span must not exceed ${this.maxRangeSpan}`);
    }

    const reservation = this.executor.reserve();

    let taskId: string;

    try {
      const task = await this.datastore.create({ x, y, datastoreOptions: input.datastoreOptions });
      taskId = task.id;
    } catch (error) {
      reservation.release();
      throw error;
    }

    this.cancellation.register(taskId);
    reservation.fill(taskId);

    this.emit(TallyEvents.TASK_SUBMITTED, { taskId, x, y, submittedAt: new Date() });

    return taskId;
  }

  /**
   * Reads the in-memory counter of a running task, or the stored record of any other task.
   *
   * @throws {TaskNotFoundError} If no task has this id.
   */
  public async getProgress(taskId: string): Promise<TaskProgress> {
    const handle = this.registry.get(taskId);

    if (handle) {
      return handle.snapshot();
    }

    const record = await this.datastore.loadById(taskId);

    if (!record) {
      throw new TaskNotFoundError(taskId);
    }

    return toProgress(record);
  }

  /**
   * Requests cancellation. A task running here is signalled and stops at its next tick. Any other
   * task, queued here or not, is signalled where known and moved to CANCELLED directly, so the
   * cancel outlives a restart. Cancelling twice is a no-op.
   *
   * @throws {TaskNotFoundError} If no task has this id and none was swept recently.
   * @throws {VersionConflictError} If the record changed under every attempt to cancel it.
   */
  public async cancel(taskId: string): Promise<CancelAcknowledgement> {
    let expectedVersion = 0;

    for (let attempt = 0; attempt < MAX_CANCEL_ATTEMPTS; attempt++) {
      if (this.signalRunning(taskId)) {
        return { taskId, outcome: 'signalled' };
      }

      const record = await this.datastore.loadById(taskId);

      if (!record) {
        if (this.recentlyDeleted.has(taskId)) {
          return { taskId, outcome: 'already-deleted' };
        }

        throw new TaskNotFoundError(taskId);
      }

      if (isTerminalStatus(record.status)) {
        return { taskId, outcome: 'already-terminal' };
      }

      // a worker may have claimed the task while it was loading
      if (this.signalRunning(taskId)) {
        return { taskId, outcome: 'signalled' };
      }

      expectedVersion = record.version;

      const result = await this.datastore.compareAndSwap(
        {
          id: taskId,
          status: TaskStatus.CANCELLED,
          current: record.current,
          finishedAt: new Date(),
        },
        record.version,
      );

      if (result.swapped) {
        return { taskId, outcome: 'cancelled' };
      }
    }

    throw new VersionConflictError(taskId, expectedVersion);
  }

  /**
   * Sets the cancellation signal of a task known to this process.
   *
   * @returns whether a worker is advancing the task right now. A queued task is signalled but
   * still needs its record moved to CANCELLED.
   */
  private signalRunning(taskId: string): boolean {
    return this.cancellation.signalCancel(taskId) && this.registry.has(taskId);
  }

  public getExecutorEvents(): EventEmitter<ExecutorEventsMap> {
    return this.executor;
  }

  public getSweeperEvents(): EventEmitter<SweeperEventsMap> {
    return this.sweeper;
  }

  /** Runs one sweep pass immediately, outside the sweeper's own schedule. */
  public async sweep() {
    return this.sweeper.sweep();
  }

  public getRunningTaskIds(): string[] {
    return this.registry.list().map((handle) => handle.taskId);
  }
}
