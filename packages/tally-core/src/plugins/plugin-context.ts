import type { EventEmitter } from 'node:events';
import type { Datastore } from '../datastore';
import type { TallyEventsMap } from '../events';
import type { ExecutorEventsMap } from '../executor/events';
import type { TaskRegistry } from '../registry';
import type { SweeperEventsMap } from '../sweeper';
import type { PluginContext } from './plugin';

export type TallyPluginContextInput<DatastoreOptions> = {
  tallyEvents: EventEmitter<TallyEventsMap>;
  executorEvents: EventEmitter<ExecutorEventsMap>;
  sweeperEvents: EventEmitter<SweeperEventsMap>;
  datastore: Datastore<DatastoreOptions>;
  registry: TaskRegistry;
};

/**
 * Tally's internal implementation of PluginContext.
 * Provides plugins with access to Tally internals and manages lifecycle hooks.
 * @internal
 */
export class TallyPluginContext<DatastoreOptions> implements PluginContext {
  private readonly startHooks: Array<() => Promise<void> | void> = [];
  private readonly stopHooks: Array<() => Promise<void> | void> = [];

  readonly hooks = {
    onStart: (handler: () => Promise<void> | void): void => {
      this.startHooks.push(handler);
    },
    onStop: (handler: () => Promise<void> | void): void => {
      this.stopHooks.push(handler);
    },
  };

  readonly tally: PluginContext['tally'];

  constructor(private readonly input: TallyPluginContextInput<DatastoreOptions>) {
    this.tally = {
      getDatastore: () => this.input.datastore,
      getRunningTaskIds: () => this.input.registry.list().map((handle) => handle.taskId),
    };
  }

  getTallyEvents(): EventEmitter<TallyEventsMap> {
    return this.input.tallyEvents;
  }

  getExecutorEvents(): EventEmitter<ExecutorEventsMap> {
    return this.input.executorEvents;
  }

  getSweeperEvents(): EventEmitter<SweeperEventsMap> {
    return this.input.sweeperEvents;
  }

  /**
   * Execute all registered start hooks in order (FIFO).
   * Called by Tally during start().
   * @internal
   */
  async executeStartHooks(): Promise<void> {
    for (const hook of this.startHooks) {
      await hook();
    }
  }

  /**
   * Execute all registered stop hooks in reverse order (LIFO).
   * Called by Tally during stop().
   * @internal
   */
  async executeStopHooks(): Promise<void> {
    for (const hook of [...this.stopHooks].reverse()) {
      await hook();
    }
  }
}
