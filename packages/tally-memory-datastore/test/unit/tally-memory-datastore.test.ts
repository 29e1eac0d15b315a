import { TaskStatus } from '@tally/core';
import { afterEach, beforeEach, describe, expect, test, vitest } from 'vitest';

import { TallyMemoryDatastore } from '../../src/tally-memory-datastore';

describe('TallyMemoryDatastore', () => {
  const NOW = new Date('2026-01-01T00:00:00.000Z');

  let memoryDatastore = new TallyMemoryDatastore();

  const later = (offsetMs: number) => vitest.setSystemTime(new Date(NOW.getTime() + offsetMs));

  beforeEach(() => {
    vitest.useFakeTimers();
    vitest.setSystemTime(NOW);

    memoryDatastore = new TallyMemoryDatastore();
  });

  afterEach(() => {
    vitest.useRealTimers();
  });

  describe('create', () => {
    test('should create a task with its counter at x', async () => {
      const result = await memoryDatastore.create({ x: 2, y: 8, datastoreOptions: {} });

      expect(result).toEqual({
        id: '0',
        x: 2,
        y: 8,
        current: 2,
        status: TaskStatus.CREATED,
        createdAt: NOW,
        updatedAt: NOW,
        version: 0,
      });
    });

    test('should give every task its own id', async () => {
      const first = await memoryDatastore.create({ x: 0, y: 1 });
      const second = await memoryDatastore.create({ x: 0, y: 1 });

      expect(first.id).toBe('0');
      expect(second.id).toBe('1');
      expect(memoryDatastore.size).toBe(2);
    });
  });

  describe('loadById', () => {
    test('should return a copy of the stored task', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 5 });

      const loaded = await memoryDatastore.loadById(task.id);

      expect(loaded).toEqual(task);
      expect(loaded).not.toBe(task);
    });

    test('should not let callers mutate stored state', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 5 });
      task.current = 4;

      expect((await memoryDatastore.loadById(task.id))?.current).toBe(0);
    });

    test('should return undefined for an unknown id', async () => {
      await expect(memoryDatastore.loadById('unknown')).resolves.toBeUndefined();
    });
  });

  describe('compareAndSwap', () => {
    test('should write the update and bump the version when the version matches', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 5 });
      later(1_000);

      const result = await memoryDatastore.compareAndSwap(
        { id: task.id, status: TaskStatus.RUNNING, current: 3, startedAt: NOW },
        0,
      );

      expect(result).toEqual({
        swapped: true,
        record: {
          ...task,
          status: TaskStatus.RUNNING,
          current: 3,
          startedAt: NOW,
          updatedAt: new Date('2026-01-01T00:00:01.000Z'),
          version: 1,
        },
      });
      expect(await memoryDatastore.loadById(task.id)).toEqual(result.swapped ? result.record : undefined);
    });

    test('should refuse a stale version and leave the task untouched', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 5 });
      await memoryDatastore.compareAndSwap({ id: task.id, status: TaskStatus.RUNNING, current: 1 }, 0);

      const result = await memoryDatastore.compareAndSwap({ id: task.id, status: TaskStatus.CANCELLED, current: 0 }, 0);

      expect(result).toEqual({ swapped: false });
      expect(await memoryDatastore.loadById(task.id)).toEqual(
        expect.objectContaining({ status: TaskStatus.RUNNING, current: 1, version: 1 }),
      );
    });

    test('should keep optional fields the update leaves out', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 5 });
      await memoryDatastore.compareAndSwap({ id: task.id, status: TaskStatus.RUNNING, current: 0, startedAt: NOW }, 0);

      const result = await memoryDatastore.compareAndSwap(
        { id: task.id, status: TaskStatus.FAILED, current: 2, error: 'boom', finishedAt: NOW },
        1,
      );

      expect(result).toEqual({
        swapped: true,
        record: expect.objectContaining({ startedAt: NOW, finishedAt: NOW, error: 'boom', version: 2 }),
      });
    });

    test('should refuse an update for an unknown id', async () => {
      await expect(
        memoryDatastore.compareAndSwap({ id: 'unknown', status: TaskStatus.RUNNING, current: 0 }, 0),
      ).resolves.toEqual({ swapped: false });
    });

    test('should let exactly one of two writers with the same version win', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 5 });

      const results = await Promise.all([
        memoryDatastore.compareAndSwap({ id: task.id, status: TaskStatus.RUNNING, current: 0 }, 0),
        memoryDatastore.compareAndSwap({ id: task.id, status: TaskStatus.CANCELLED, current: 0 }, 0),
      ]);

      expect(results.map((result) => result.swapped)).toEqual([true, false]);
      expect((await memoryDatastore.loadById(task.id))?.status).toBe(TaskStatus.RUNNING);
    });
  });

  describe('findByStatusOlderThan', () => {
    test('should return matching tasks created before the cutoff, oldest first', async () => {
      const first = await memoryDatastore.create({ x: 0, y: 1 });
      later(1_000);
      const second = await memoryDatastore.create({ x: 0, y: 1 });
      later(2_000);
      await memoryDatastore.create({ x: 0, y: 1 });

      const result = await memoryDatastore.findByStatusOlderThan({
        status: TaskStatus.CREATED,
        timestampField: 'createdAt',
        olderThan: new Date('2026-01-01T00:00:02.000Z'),
      });

      expect(result.map((task) => task.id)).toEqual([first.id, second.id]);
    });

    test('should compare against updatedAt when asked to', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 1 });
      later(5_000);
      await memoryDatastore.compareAndSwap({ id: task.id, status: TaskStatus.RUNNING, current: 0 }, 0);

      const byCreation = await memoryDatastore.findByStatusOlderThan({
        status: TaskStatus.RUNNING,
        timestampField: 'createdAt',
        olderThan: new Date('2026-01-01T00:00:03.000Z'),
      });
      const byUpdate = await memoryDatastore.findByStatusOlderThan({
        status: TaskStatus.RUNNING,
        timestampField: 'updatedAt',
        olderThan: new Date('2026-01-01T00:00:03.000Z'),
      });

      expect(byCreation.map(({ id }) => id)).toEqual([task.id]);
      expect(byUpdate).toEqual([]);
    });

    test('should leave out tasks exactly at the cutoff and tasks in other statuses', async () => {
      await memoryDatastore.create({ x: 0, y: 1 });
      const running = await memoryDatastore.create({ x: 0, y: 1 });
      await memoryDatastore.compareAndSwap({ id: running.id, status: TaskStatus.RUNNING, current: 0 }, 0);

      await expect(
        memoryDatastore.findByStatusOlderThan({ status: TaskStatus.CREATED, timestampField: 'createdAt', olderThan: NOW }),
      ).resolves.toEqual([]);
    });

    test('should return at most limit tasks', async () => {
      for (let i = 0; i < 5; i++) {
        await memoryDatastore.create({ x: 0, y: 1 });
      }
      later(1_000);

      const result = await memoryDatastore.findByStatusOlderThan({
        status: TaskStatus.CREATED,
        timestampField: 'createdAt',
        olderThan: new Date(),
        limit: 2,
      });

      expect(result).toHaveLength(2);
    });
  });

  describe('delete', () => {
    test('should delete a task and return it', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 1 });

      await expect(memoryDatastore.delete(task.id)).resolves.toEqual(task);
      expect(memoryDatastore.size).toBe(0);
    });

    test('should delete only when the expected version still matches', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 1 });
      await memoryDatastore.compareAndSwap({ id: task.id, status: TaskStatus.RUNNING, current: 0 }, 0);

      await expect(memoryDatastore.delete(task.id, { expectedVersion: 0 })).resolves.toBeUndefined();
      expect(memoryDatastore.size).toBe(1);

      await expect(memoryDatastore.delete(task.id, { expectedVersion: 1 })).resolves.toEqual(
        expect.objectContaining({ id: task.id, version: 1 }),
      );
      expect(memoryDatastore.size).toBe(0);
    });

    test('should return a copy of the deleted task', async () => {
      const task = await memoryDatastore.create({ x: 0, y: 1 });
      const swapped = await memoryDatastore.compareAndSwap({ id: task.id, status: TaskStatus.RUNNING, current: 1 }, 0);

      const deleted = await memoryDatastore.delete(task.id);

      expect(deleted).toEqual(swapped.swapped ? swapped.record : undefined);
      expect(deleted).not.toBe(swapped.swapped ? swapped.record : undefined);
    });

    test('should return undefined for an unknown id', async () => {
      await expect(memoryDatastore.delete('unknown')).resolves.toBeUndefined();
    });
  });
});
