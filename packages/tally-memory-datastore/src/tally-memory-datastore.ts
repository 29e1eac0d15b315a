import type {
  CompareAndSwapResult,
  CreateTaskInput,
  Datastore,
  DeleteOptions,
  FindByStatusOlderThanInput,
  TaskRecord,
  TaskUpdate,
} from '@tally/core';
import { TaskStatus } from '@tally/core';

export type MemoryDatastoreOptions = Record<string, unknown>;

/**
 * Keeps task records in a Map. Records are copied on the way in and out so callers can never
 * mutate stored state without a compare-and-swap.
 */
export class TallyMemoryDatastore<DatastoreOptions = MemoryDatastoreOptions> implements Datastore<DatastoreOptions> {
  private store: Map<string, TaskRecord>;
  private nextId: number;

  constructor() {
    this.store = new Map();
    this.nextId = 0;
  }

  /**
   * Creates a task in CREATED status with its counter at `x`.
   *
   * @param input The range of the task.
   * @returns The created task.
   */
  async create(input: CreateTaskInput<DatastoreOptions>): Promise<TaskRecord> {
    const id = (this.nextId++).toString();
    const now = new Date();

    const task: TaskRecord = {
      id,
      x: input.x,
      y: input.y,
      current: input.x,
      status: TaskStatus.CREATED,
      createdAt: now,
      updatedAt: now,
      version: 0,
    };

    this.store.set(id, task);

    return { ...task };
  }

  async loadById(taskId: string): Promise<TaskRecord | undefined> {
    const task = this.store.get(taskId);

    return task ? { ...task } : undefined;
  }

  /**
   * Writes the update when the stored version matches, bumping the version and `updatedAt`.
   *
   * @param update The fields to write. Optional fields left undefined keep their stored value.
   * @param expectedVersion The version the caller last read.
   */
  async compareAndSwap(update: TaskUpdate, expectedVersion: number): Promise<CompareAndSwapResult> {
    const task = this.store.get(update.id);

    if (!task || task.version !== expectedVersion) {
      return { swapped: false };
    }

    const swapped: TaskRecord = {
      ...task,
      status: update.status,
      current: update.current,
      startedAt: update.startedAt ?? task.startedAt,
      finishedAt: update.finishedAt ?? task.finishedAt,
      error: update.error ?? task.error,
      updatedAt: new Date(),
      version: task.version + 1,
    };

    this.store.set(swapped.id, swapped);

    return { swapped: true, record: { ...swapped } };
  }

  /**
   * @returns Records in `status` whose timestamp is strictly before `olderThan`, oldest first.
   */
  async findByStatusOlderThan(input: FindByStatusOlderThanInput): Promise<TaskRecord[]> {
    const matches = Array.from(this.store.values())
      .filter((t) => t.status === input.status && t[input.timestampField] < input.olderThan)
      .sort((a, b) => a[input.timestampField].getTime() - b[input.timestampField].getTime());

    return matches.slice(0, input.limit ?? matches.length).map((t) => ({ ...t }));
  }

  /**
   * Deletes a task and returns it.
   *
   * @param options.expectedVersion When set, the task is only deleted if its version still matches.
   * @returns The deleted task, or undefined when nothing was deleted.
   */
  async delete(taskId: string, options?: DeleteOptions): Promise<TaskRecord | undefined> {
    const task = this.store.get(taskId);

    if (!task) {
      return undefined;
    }

    if (options?.expectedVersion !== undefined && task.version !== options.expectedVersion) {
      return undefined;
    }

    this.store.delete(taskId);

    return { ...task };
  }

  get size(): number {
    return this.store.size;
  }
}
