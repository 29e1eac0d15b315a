import type { EventEmitter } from 'node:events';
import type { ExecutorEventsMap } from './events';

/**
 * A slot held for a task while its record is being created. Exactly one of `fill` or `release`
 * takes effect.
 */
export interface Reservation {
  /** Queues the task in the reserved slot */
  fill(taskId: string): void;
  /** Gives the slot back without queueing anything */
  release(): void;
}

export interface TaskExecutor extends EventEmitter<ExecutorEventsMap> {
  start(): Promise<void>;
  stop(): Promise<void>;
  /**
   * Holds a slot in the pool or its queue.
   * @throws {CapacityExceededError} when every worker is busy and the queue is full.
   */
  reserve(): Reservation;
  /**
   * Queues orphaned CREATED and RUNNING records found in the datastore.
   * @returns the number of tasks queued.
   */
  recover(): Promise<number>;
}
