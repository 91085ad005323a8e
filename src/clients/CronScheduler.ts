import * as cron from 'node-cron';
import { v4 as uuidv4 } from 'uuid';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { OperationError } from '../utils/OperationError';
import { formatError, toError } from '../utils/errorUtils';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends OperationError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'CronSchedulerError';
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * Runs backup-all followed by retention cleanup on a cron schedule.
 * A tick that fires while the previous run is still going is skipped.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private backupManager: BackupManager;
  private logger: Logger;
  private isBackupRunning = false;

  constructor(config: CronSchedulerConfig, backupManager: BackupManager, logger: Logger) {
    this.config = config;
    this.backupManager = backupManager;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    const timezone = this.config.timezone || 'UTC';
    this.logger.info(
      `Starting cron scheduler with expression: ${this.config.cronExpression} (timezone: ${timezone})`
    );

    this.task = cron.schedule(this.config.cronExpression, () => this.executeScheduledRun(), {
      scheduled: false, // Don't start immediately
      timezone,
    });
    this.task.start();

    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup due to runOnInit configuration');
      setImmediate(() => {
        this.executeScheduledRun().catch(error => {
          this.logger.error('Initial backup execution failed', toError(error));
        });
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.logger.info('Stopping cron scheduler...');
    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  validateCronExpression(expression: string): boolean {
    return cron.validate(expression);
  }

  /**
   * Execute one scheduled backup-all + cleanup with overlap prevention.
   * Failures are logged; the schedule keeps running.
   */
  async executeScheduledRun(): Promise<void> {
    if (this.isBackupRunning) {
      this.logger.warn('Backup is already running, skipping this scheduled execution');
      return;
    }

    this.isBackupRunning = true;
    const startTime = Date.now();
    const executionId = `cron-${uuidv4()}`;

    try {
      this.logger.logScheduledExecution(this.config.cronExpression);

      const run = await this.backupManager.backupAll();
      const retention = await this.backupManager.cleanup();

      this.logger.info(`[${executionId}] Scheduled run completed in ${Date.now() - startTime}ms`, {
        timestamp: run.timestamp,
        databases: run.backups.map(backup => backup.databaseName),
        deletedCount: retention.deletedCount,
      });
    } catch (error) {
      this.logger.error(
        `[${executionId}] Scheduled run failed after ${Date.now() - startTime}ms: ${formatError(error)}`,
        toError(error),
        {
          cronExpression: this.config.cronExpression,
          timezone: this.config.timezone || 'UTC',
        }
      );
    } finally {
      this.isBackupRunning = false;
    }
  }
}
