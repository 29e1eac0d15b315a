import type { EventEmitter } from 'node:events';
import type { Datastore } from '../datastore';
import type { TallyEventsMap } from '../events';
import type { ExecutorEventsMap } from '../executor/events';
import type { SweeperEventsMap } from '../sweeper';

/**
 * Plugin interface - all plugins must implement this.
 * @template API - The API type returned by the plugin's register function (defaults to void)
 */
export interface TallyPlugin<API = void> {
  /** Unique plugin identifier */
  name: string;

  /**
   * Called when the plugin is registered via tally.use().
   * Can return an API object for type-safe access to plugin functionality.
   * @param context - The plugin context providing access to Tally internals
   * @returns The plugin's public API (if any)
   */
  register(context: PluginContext): API;
}

/**
 * Context passed to plugins during registration.
 * Provides access to engine events, lifecycle hooks, and read-only Tally APIs.
 */
export interface PluginContext {
  /** The events of the Tally instance itself (lifecycle and submissions) */
  getTallyEvents(): EventEmitter<TallyEventsMap>;

  /** The events of the worker pool executing tasks */
  getExecutorEvents(): EventEmitter<ExecutorEventsMap>;

  /** The events of the staleness sweeper */
  getSweeperEvents(): EventEmitter<SweeperEventsMap>;

  /** Register lifecycle hooks */
  hooks: {
    /**
     * Register a handler to be called when Tally starts.
     * Handlers are executed in registration order (FIFO).
     */
    onStart(handler: () => Promise<void> | void): void;

    /**
     * Register a handler to be called when Tally stops.
     * Handlers are executed in reverse registration order (LIFO).
     */
    onStop(handler: () => Promise<void> | void): void;
  };

  /** Read-only access to Tally internals */
  tally: {
    /** Get the datastore instance */
    getDatastore(): Datastore<unknown>;

    /** Get the ids of the tasks a worker is advancing right now */
    getRunningTaskIds(): string[];
  };
}
