import { TallyMemoryDatastore } from '@tally/memory-datastore';
import { afterEach, beforeEach, describe, expect, test, vitest } from 'vitest';

import { TaskStatus } from '../../src/datastore';
import { CapacityExceededError, InvalidRangeError, TaskNotFoundError } from '../../src/errors';
import { TallyEvents } from '../../src/events';
import { ExecutorEvents } from '../../src/executor';
import type { TallyPlugin } from '../../src/plugins/plugin';
import { Tally, type TallyConfiguration } from '../../src/tally';

describe('Tally', () => {
  const NOW = new Date('2026-01-01T00:00:00.000Z');

  let datastore: TallyMemoryDatastore;
  let tally: Tally<Record<string, unknown>>;

  const createTally = (configuration: TallyConfiguration = {}) => new Tally(datastore, configuration);

  beforeEach(() => {
    vitest.useFakeTimers();
    vitest.setSystemTime(NOW);

    datastore = new TallyMemoryDatastore();
    tally = createTally();
  });

  afterEach(async () => {
    await tally.stop();
    vitest.useRealTimers();
  });

  describe('constructor', () => {
    test('throws when maxRangeSpan is not a positive integer', () => {
      expect(() => createTally({ maxRangeSpan: 0 })).toThrow('maxRangeSpan must be a positive integer, received 0');
    });

    test('throws when the executor configuration is invalid', () => {
      expect(() => createTally({ executor: { maxConcurrency: -1 } })).toThrow(
        'maxConcurrency must be a positive integer, received -1',
      );
    });
  });

  describe('start', () => {
    test('emits started event when tally is started successfully', async () => {
      const emitSpy = vitest.spyOn(tally, 'emit');

      await tally.start();

      expect(emitSpy).toHaveBeenCalledOnce();
      expect(emitSpy).toHaveBeenCalledWith(TallyEvents.STARTED, { startedAt: expect.any(Date) });
    });
  });

  describe('stop', () => {
    test('emits stopped event when tally is stopped successfully', async () => {
      const emitSpy = vitest.spyOn(tally, 'emit');

      await tally.start();
      await tally.stop();

      expect(emitSpy).toHaveBeenLastCalledWith(TallyEvents.STOPPED, { stoppedAt: expect.any(Date) });
    });

    test('emits stopAborted event when a stop hook does not finish in time', async () => {
      const stopAborted = vitest.fn();
      tally.on(TallyEvents.STOP_ABORTED, stopAborted);
      tally.use({
        name: 'stuck',
        register: (ctx) => ctx.hooks.onStop(() => new Promise<void>(() => {})),
      });

      const stopping = tally.stop();
      await vitest.advanceTimersByTimeAsync(tally.exitTimeoutMs);
      await stopping;

      expect(stopAborted).toHaveBeenCalledWith({ error: new Error('Promise timed out'), timestamp: expect.any(Date) });

      tally = createTally();
    });

    test('leaves a running task RUNNING with its progress flushed', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 100 });
      await vitest.advanceTimersByTimeAsync(2_500);

      await tally.stop();

      expect(await datastore.loadById(taskId)).toEqual(
        expect.objectContaining({ current: 2, status: TaskStatus.RUNNING }),
      );
    });
  });

  describe('submit', () => {
    test('creates a CREATED record and emits taskSubmitted', async () => {
      const submitted = vitest.fn();
      tally.on(TallyEvents.TASK_SUBMITTED, submitted);

      const taskId = await tally.submit({ x: 3, y: 9 });

      expect(await datastore.loadById(taskId)).toEqual(
        expect.objectContaining({ id: taskId, x: 3, y: 9, current: 3, status: TaskStatus.CREATED, version: 0 }),
      );
      expect(submitted).toHaveBeenCalledWith({ taskId, x: 3, y: 9, submittedAt: expect.any(Date) });
    });

    test('rejects y < x without creating a record', async () => {
      await expect(tally.submit({ x: 5, y: 2 })).rejects.toThrow(InvalidRangeError);
      await expect(tally.submit({ x: 5, y: 2 })).rejects.toThrow(
        'Invalid range [5, 2]: y must be greater than or equal to x',
      );
      expect(datastore.size).toBe(0);
    });

    test('rejects bounds that are not integers', async () => {
      await expect(tally.submit({ x: 0.5, y: 3 })).rejects.toThrow('Invalid range [0.5, 3]: bounds must be integers');
      expect(datastore.size).toBe(0);
    });

    test('rejects a span larger than maxRangeSpan', async () => {
      tally = createTally({ maxRangeSpan: 10 });

      await expect(tally.submit({ x: 0, y: 11 })).rejects.toThrow('Invalid range [0, 11]: span must not exceed 10');
      await expect(tally.submit({ x: 0, y: 10 })).resolves.toEqual(expect.any(String));
      expect(datastore.size).toBe(1);
    });

    test('accepts a single-value range', async () => {
      await expect(tally.submit({ x: 4, y: 4 })).resolves.toEqual(expect.any(String));
    });

    test('rejects submissions once the pool and queue are full', async () => {
      tally = createTally({ executor: { maxConcurrency: 1, maxQueueSize: 1 } });

      await tally.submit({ x: 0, y: 10 });
      await tally.submit({ x: 0, y: 10 });

      await expect(tally.submit({ x: 0, y: 10 })).rejects.toThrow(CapacityExceededError);
      expect(datastore.size).toBe(2);
    });

    test('gives the slot back when the record cannot be created', async () => {
      tally = createTally({ executor: { maxConcurrency: 1, maxQueueSize: 1 } });
      vitest.spyOn(datastore, 'create').mockRejectedValueOnce(new Error('insert failed'));

      await expect(tally.submit({ x: 0, y: 10 })).rejects.toThrow('insert failed');
      await tally.submit({ x: 0, y: 10 });
      await tally.submit({ x: 0, y: 10 });

      expect(datastore.size).toBe(2);
    });
  });

  describe('getProgress', () => {
    test('reports a completed run of (0, 5) after 6 ticks', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 5 });

      await vitest.advanceTimersByTimeAsync(6_000);

      await expect(tally.getProgress(taskId)).resolves.toEqual({
        taskId,
        current: 5,
        status: TaskStatus.COMPLETED,
        percentage: 100,
      });
    });

    test('reads the in-memory counter of a running task', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 5 });

      await vitest.advanceTimersByTimeAsync(2_500);

      await expect(tally.getProgress(taskId)).resolves.toEqual({
        taskId,
        current: 2,
        status: TaskStatus.RUNNING,
        percentage: 40,
      });
      expect((await datastore.loadById(taskId))?.current).toBe(0);
      expect(tally.getRunningTaskIds()).toEqual([taskId]);
    });

    test('never reports a smaller counter than before', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 20 });
      const readings: number[] = [];

      for (let i = 0; i < 25; i++) {
        await vitest.advanceTimersByTimeAsync(500);
        readings.push((await tally.getProgress(taskId)).current);
      }

      expect(readings).toEqual([...readings].sort((a, b) => a - b));
      expect(readings.at(-1)).toBe(12);
    });

    test('reports a queued task from the datastore', async () => {
      const taskId = await tally.submit({ x: 10, y: 20 });

      await expect(tally.getProgress(taskId)).resolves.toEqual({
        taskId,
        current: 10,
        status: TaskStatus.CREATED,
        percentage: 0,
      });
    });

    test('throws TaskNotFoundError for an unknown id', async () => {
      await expect(tally.getProgress('unknown')).rejects.toThrow(TaskNotFoundError);
      await expect(tally.getProgress('unknown')).rejects.toThrow('Task with id unknown not found');
    });
  });

  describe('cancel', () => {
    test('cancels (0, 100000) within one tick of the request', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 100_000 });

      await tally.cancel(taskId);
      await vitest.advanceTimersByTimeAsync(1_000);

      await expect(tally.getProgress(taskId)).resolves.toEqual({
        taskId,
        current: 0,
        status: TaskStatus.CANCELLED,
        percentage: 0,
      });
    });

    test('freezes the counter of a task cancelled mid-run', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 10 });
      await vitest.advanceTimersByTimeAsync(4_500);

      await tally.cancel(taskId);
      await vitest.advanceTimersByTimeAsync(10_000);

      await expect(tally.getProgress(taskId)).resolves.toEqual({
        taskId,
        current: 4,
        status: TaskStatus.CANCELLED,
        percentage: 40,
      });
    });

    test('cancels a task waiting behind a busy pool right away', async () => {
      tally = createTally({ executor: { maxConcurrency: 1 } });
      await tally.start();
      const runningId = await tally.submit({ x: 0, y: 1_000 });
      const queuedId = await tally.submit({ x: 0, y: 5 });

      await expect(tally.cancel(queuedId)).resolves.toEqual({ taskId: queuedId, outcome: 'cancelled' });
      await vitest.advanceTimersByTimeAsync(3_000);

      await expect(tally.getProgress(queuedId)).resolves.toEqual({
        taskId: queuedId,
        current: 0,
        status: TaskStatus.CANCELLED,
        percentage: 0,
      });
      expect(tally.getRunningTaskIds()).toEqual([runningId]);
    });

    test('lets a worker skip a queued task once it was cancelled', async () => {
      tally = createTally({ executor: { maxConcurrency: 1 } });
      const abandoned = vitest.fn();
      tally.getExecutorEvents().on(ExecutorEvents.TASK_ABANDONED, abandoned);
      await tally.start();
      await tally.submit({ x: 0, y: 2 });
      const queuedId = await tally.submit({ x: 0, y: 5 });

      await tally.cancel(queuedId);
      await vitest.advanceTimersByTimeAsync(10_000);

      expect(abandoned).toHaveBeenCalledWith({ taskId: queuedId, reason: 'terminal' });
      expect(await datastore.loadById(queuedId)).toEqual(
        expect.objectContaining({ status: TaskStatus.CANCELLED, current: 0, version: 1 }),
      );
    });

    test('keeps the cancel of a queued task across a restart', async () => {
      tally = createTally({ executor: { maxConcurrency: 1 } });
      await tally.start();
      const runningId = await tally.submit({ x: 0, y: 1_000 });
      const queuedId = await tally.submit({ x: 0, y: 5 });
      await tally.cancel(queuedId);
      await tally.stop();

      vitest.setSystemTime(new Date(Date.now() + 31_000));
      tally = createTally({ executor: { maxConcurrency: 1 } });
      await tally.start();
      await vitest.advanceTimersByTimeAsync(10_000);

      expect((await tally.getProgress(queuedId)).status).toBe(TaskStatus.CANCELLED);
      expect(tally.getRunningTaskIds()).toEqual([runningId]);
    });

    test('answers a second cancel as a no-op', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 10 });
      await vitest.advanceTimersByTimeAsync(1_500);

      await tally.cancel(taskId);
      await vitest.advanceTimersByTimeAsync(0);
      const cancelled = await datastore.loadById(taskId);

      await expect(tally.cancel(taskId)).resolves.toEqual({ taskId, outcome: 'already-terminal' });
      expect(await datastore.loadById(taskId)).toEqual(cancelled);
    });

    test('answers concurrent cancels of a running task the same way', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 10 });
      await vitest.advanceTimersByTimeAsync(1_500);

      const acknowledgements = await Promise.all([tally.cancel(taskId), tally.cancel(taskId)]);

      expect(acknowledgements).toEqual([
        { taskId, outcome: 'signalled' },
        { taskId, outcome: 'signalled' },
      ]);
    });

    test('does not touch a completed task', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 2 });
      await vitest.advanceTimersByTimeAsync(2_000);

      await expect(tally.cancel(taskId)).resolves.toEqual({ taskId, outcome: 'already-terminal' });
      expect((await datastore.loadById(taskId))?.status).toBe(TaskStatus.COMPLETED);
    });

    test('cancels a record nobody is running directly in the datastore', async () => {
      const record = await datastore.create({ x: 0, y: 10 });

      await expect(tally.cancel(record.id)).resolves.toEqual({ taskId: record.id, outcome: 'cancelled' });
      expect(await datastore.loadById(record.id)).toEqual(
        expect.objectContaining({ status: TaskStatus.CANCELLED, current: 0, version: 1, finishedAt: NOW }),
      );
    });

    test('cancels an orphaned RUNNING record at its stored counter', async () => {
      const record = await datastore.create({ x: 0, y: 10 });
      await datastore.compareAndSwap({ id: record.id, status: TaskStatus.RUNNING, current: 6 }, 0);

      await expect(tally.cancel(record.id)).resolves.toEqual({ taskId: record.id, outcome: 'cancelled' });
      expect(await datastore.loadById(record.id)).toEqual(
        expect.objectContaining({ status: TaskStatus.CANCELLED, current: 6 }),
      );
    });

    test('reports a task removed by the sweeper', async () => {
      tally = createTally({ sweeper: { createdTaskMaxAgeMs: 1_000 } });
      const record = await datastore.create({ x: 0, y: 10 });
      vitest.setSystemTime(new Date(NOW.getTime() + 2_000));

      await expect(tally.sweep()).resolves.toEqual({ deleted: 1, artifactsReleased: 0 });

      await expect(tally.cancel(record.id)).resolves.toEqual({ taskId: record.id, outcome: 'already-deleted' });
    });

    test('throws TaskNotFoundError for an id that never existed', async () => {
      await expect(tally.cancel('unknown')).rejects.toThrow('Task with id unknown not found');
    });
  });

  describe('recovery', () => {
    test('resumes an interrupted task in a new instance from its persisted counter', async () => {
      await tally.start();
      const taskId = await tally.submit({ x: 0, y: 100 });
      await vitest.advanceTimersByTimeAsync(2_500);
      await tally.stop();

      vitest.setSystemTime(new Date(Date.now() + 31_000));
      tally = createTally();
      await tally.start();
      await vitest.advanceTimersByTimeAsync(3_000);

      await expect(tally.getProgress(taskId)).resolves.toEqual(
        expect.objectContaining({ current: 5, status: TaskStatus.RUNNING }),
      );
    });
  });

  describe('use', () => {
    test('returns the API of the plugin', () => {
      const plugin: TallyPlugin<{ greeting: string }> = {
        name: 'greeter',
        register: () => ({ greeting: 'hello' }),
      };

      expect(tally.use(plugin)).toEqual({ greeting: 'hello' });
    });

    test('runs start hooks when tally starts', async () => {
      const onStart = vitest.fn();
      tally.use({ name: 'hooked', register: (ctx) => ctx.hooks.onStart(onStart) });

      await tally.start();

      expect(onStart).toHaveBeenCalledOnce();
    });

    test('throws when a plugin is registered after start', async () => {
      await tally.start();

      expect(() => tally.use({ name: 'late', register: () => undefined })).toThrow(
        'Cannot register plugin "late" after Tally has started',
      );
    });

    test('throws when a plugin name is registered twice', () => {
      tally.use({ name: 'twice', register: () => undefined });

      expect(() => tally.use({ name: 'twice', register: () => undefined })).toThrow(
        'Plugin "twice" is already registered',
      );
    });
  });
});
