/**
 * Runs backup-all followed by retention cleanup on a cron schedule. A tick that
 * fires while the previous run is still going is skipped.
 */
export interface CronScheduler {
  start(): void;

  /** No further runs start; one already in flight finishes */
  stop(): void;

  isRunning(): boolean;

  validateCronExpression(expression: string): boolean;
}

export interface CronSchedulerConfig {
  /** When backup-all followed by cleanup runs */
  cronExpression: string;

  /** Zone the expression is read in; UTC when unset */
  timezone?: string;

  /** Do one backup-all + cleanup as soon as the scheduler starts */
  runOnInit?: boolean;
}
