import { ExecutorEvents, Tally } from '@tally/core';
import { createLoggerPlugin } from '@tally/logger-plugin';
import { TallyMemoryDatastore } from '@tally/memory-datastore';

async function main() {
  const memoryDatastore = new TallyMemoryDatastore();
  const tally = new Tally(memoryDatastore, {
    executor: { maxConcurrency: 2, tickIntervalMs: 200, flushIntervalMs: 1_000 },
  });

  const { logger } = tally.use(createLoggerPlugin({ level: 'debug', name: 'sample-app' }));

  const executorEvents = tally.getExecutorEvents();
  const taskEndings = [
    new Promise((resolve) => executorEvents.once(ExecutorEvents.TASK_COMPLETED, resolve)),
    new Promise((resolve) => executorEvents.once(ExecutorEvents.TASK_CANCELLED, resolve)),
  ];

  await tally.start();

  await tally.submit({ x: 0, y: 10 });
  const longTaskId = await tally.submit({ x: 0, y: 1_000 });

  // let the long task run for a bit, then cancel it
  await new Promise((resolve) => setTimeout(resolve, 1_000));
  logger.info(await tally.getProgress(longTaskId), 'progress before cancelling');

  const acknowledgement = await tally.cancel(longTaskId);
  logger.info(acknowledgement, 'cancel requested');

  await Promise.all(taskEndings);

  logger.info(await tally.getProgress(longTaskId), 'progress after cancelling');

  await tally.stop();
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
