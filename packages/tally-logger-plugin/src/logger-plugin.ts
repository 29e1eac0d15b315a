import {
  ExecutorEvents,
  type PluginContext,
  SweeperEvents,
  TallyEvents,
  type TallyPlugin,
} from '@tally/core';
import pino, { type Level, type Logger } from 'pino';

const DEFAULT_LOGGER_NAME = 'tally';

/**
 * Configuration for the logger plugin.
 * Pass an existing pino `logger` to share its destination, or a `level` and `name` to build one.
 */
export interface LoggerPluginConfig {
  /** An existing pino logger. When set, `level` and `name` are ignored */
  logger?: Logger;
  /** @default 'info' */
  level?: Level;
  /** @default 'tally' */
  name?: string;
}

export interface LoggerPluginAPI {
  /** The root logger the plugin writes to */
  logger: Logger;
}

/**
 * Creates a plugin that writes a structured log line for every engine event.
 *
 * @example
 * ```typescript
 * import { Tally } from '@tally/core';
 * import { createLoggerPlugin } from '@tally/logger-plugin';
 *
 * const tally = new Tally(datastore);
 * const { logger } = tally.use(createLoggerPlugin({ level: 'debug' }));
 *
 * await tally.start();
 * ```
 */
export function createLoggerPlugin(config: LoggerPluginConfig = {}): TallyPlugin<LoggerPluginAPI> {
  return {
    name: 'logger',

    register(ctx: PluginContext): LoggerPluginAPI {
      const logger =
        config.logger ?? pino({ name: config.name ?? DEFAULT_LOGGER_NAME, level: config.level ?? 'info' });

      registerTallyListeners(ctx, logger.child({ component: 'tally' }));
      registerExecutorListeners(ctx, logger.child({ component: 'executor' }));
      registerSweeperListeners(ctx, logger.child({ component: 'sweeper' }));

      return { logger };
    },
  };
}

function registerTallyListeners(ctx: PluginContext, logger: Logger): void {
  const events = ctx.getTallyEvents();

  events.on(TallyEvents.STARTED, ({ startedAt }) => {
    logger.info({ startedAt }, 'Tally started');
  });

  events.on(TallyEvents.STOPPED, ({ stoppedAt }) => {
    logger.info({ stoppedAt }, 'Tally stopped');
  });

  events.on(TallyEvents.STOP_ABORTED, ({ error }) => {
    logger.warn({ err: error }, 'Tally failed to stop in time, shutdown aborted');
  });

  events.on(TallyEvents.TASK_SUBMITTED, ({ taskId, x, y }) => {
    logger.info({ taskId, x, y }, 'Task submitted');
  });
}

function registerExecutorListeners(ctx: PluginContext, logger: Logger): void {
  const events = ctx.getExecutorEvents();

  events.on(ExecutorEvents.TASK_CLAIMED, ({ task }) => {
    logger.debug({ taskId: task.id, current: task.current, version: task.version }, 'Task claimed');
  });

  events.on(ExecutorEvents.TASK_PROGRESS_FLUSHED, ({ task }) => {
    logger.debug({ taskId: task.id, current: task.current, version: task.version }, 'Task progress flushed');
  });

  events.on(ExecutorEvents.TASK_RECOVERED, ({ task }) => {
    logger.debug({ taskId: task.id, status: task.status, current: task.current }, 'Task recovered');
  });

  events.on(ExecutorEvents.TASK_ABANDONED, ({ taskId, reason }) => {
    logger.debug({ taskId, reason }, 'Task abandoned');
  });

  events.on(ExecutorEvents.TASK_COMPLETED, ({ task }) => {
    logger.info({ taskId: task.id, current: task.current }, 'Task completed');
  });

  events.on(ExecutorEvents.TASK_CANCELLED, ({ task }) => {
    logger.info({ taskId: task.id, current: task.current }, 'Task cancelled');
  });

  events.on(ExecutorEvents.TASK_INTERRUPTED, ({ task }) => {
    logger.info({ taskId: task.id, current: task.current }, 'Task interrupted by shutdown');
  });

  events.on(ExecutorEvents.TASK_SUPERSEDED, ({ taskId, reason }) => {
    logger.warn({ taskId, reason }, 'Task superseded by another writer');
  });

  events.on(ExecutorEvents.TASK_FAILED, ({ task, error }) => {
    logger.error({ taskId: task.id, current: task.current, err: error }, 'Task failed');
  });

  events.on(ExecutorEvents.UNKNOWN_PROCESSING_ERROR, ({ taskId, error }) => {
    logger.error({ taskId, err: error }, 'Unknown processing error');
  });
}

function registerSweeperListeners(ctx: PluginContext, logger: Logger): void {
  const events = ctx.getSweeperEvents();

  events.on(SweeperEvents.TASK_SWEPT, ({ task, rule }) => {
    logger.info({ taskId: task.id, status: task.status, rule }, 'Task swept');
  });

  events.on(SweeperEvents.ARTIFACT_RELEASE_FAILED, ({ taskId, rule, error }) => {
    logger.warn({ taskId, rule, err: error }, 'Failed to release task artifacts');
  });

  events.on(SweeperEvents.SWEEP_COMPLETED, ({ result }) => {
    logger.info(result, 'Sweep completed');
  });

  events.on(SweeperEvents.SWEEP_FAILED, ({ error }) => {
    logger.error({ err: error }, 'Sweep failed');
  });
}
