export const TallyEvents = {
  /** Tally instance has started the executor and the sweeper */
  STARTED: 'started',
  /** Tally instance has stopped every loop and run the plugin stop hooks */
  STOPPED: 'stopped',
  /** Tally instance has failed to gracefully stop so shutdown has been aborted */
  STOP_ABORTED: 'stopAborted',
  /** A task record has been created and queued for execution */
  TASK_SUBMITTED: 'taskSubmitted',
} as const;

export type TallyEvents = (typeof TallyEvents)[keyof typeof TallyEvents];

export type TallyEventsMap = {
  [TallyEvents.STARTED]: [{ startedAt: Date }];
  [TallyEvents.STOPPED]: [{ stoppedAt: Date }];
  [TallyEvents.STOP_ABORTED]: [{ timestamp: Date; error: unknown }];
  [TallyEvents.TASK_SUBMITTED]: [{ taskId: string; x: number; y: number; submittedAt: Date }];
};
