import * as cron from 'node-cron';
import { CronScheduler, CronValidationError } from '../src/clients/CronScheduler';
import { BackupManager, BackupRunResult } from '../src/interfaces/BackupManager';
import { CronSchedulerConfig } from '../src/interfaces/CronScheduler';
import { RetentionResult } from '../src/interfaces/RetentionManager';
import { createMockLogger } from './helpers/mocks';

// Mock node-cron
jest.mock('node-cron', () => ({
  schedule: jest.fn(),
  validate: jest.fn(),
}));

describe('CronScheduler', () => {
  let mockBackupManager: jest.Mocked<BackupManager>;
  let mockLogger: ReturnType<typeof createMockLogger>;
  let mockTask: { start: jest.Mock; stop: jest.Mock };
  let scheduler: CronScheduler;
  let config: CronSchedulerConfig;

  const runResult: BackupRunResult = {
    timestamp: '2024-01-15T02-00-00',
    backups: [
      {
        databaseName: 'x',
        fileName: 'x.2024-01-15T02-00-00.sql.gz',
        fileSize: 10,
        s3Key: 'env.x/x.2024-01-15T02-00-00.sql.gz',
        s3Location: 's3://test-bucket/env.x/x.2024-01-15T02-00-00.sql.gz',
        duration: 5,
      },
    ],
    duration: 5,
  };
  const retentionResult: RetentionResult = {
    totalCount: 3,
    keepCount: 2,
    deletedCount: 1,
    deletedKeys: ['env.x/x.old.sql.gz'],
    skippedKeys: [],
  };

  beforeEach(() => {
    mockBackupManager = {
      backupAll: jest.fn().mockResolvedValue(runResult),
      list: jest.fn(),
      download: jest.fn(),
      restore: jest.fn(),
      clone: jest.fn(),
      cleanup: jest.fn().mockResolvedValue(retentionResult),
      validateConfiguration: jest.fn(),
    };
    mockLogger = createMockLogger();
    mockTask = { start: jest.fn(), stop: jest.fn() };

    jest.mocked(cron.schedule).mockReturnValue(mockTask as unknown as cron.ScheduledTask);
    jest.mocked(cron.validate).mockReturnValue(true);

    config = {
      cronExpression: '0 2 * * *', // Daily at 2 AM
      timezone: 'UTC',
    };

    scheduler = new CronScheduler(config, mockBackupManager, mockLogger);
  });

  describe('start', () => {
    it('should schedule and start the task', () => {
      scheduler.start();

      expect(cron.schedule).toHaveBeenCalledWith('0 2 * * *', expect.any(Function), {
        scheduled: false,
        timezone: 'UTC',
      });
      expect(mockTask.start).toHaveBeenCalled();
      expect(scheduler.isRunning()).toBe(true);
    });

    it('should reject an invalid cron expression', () => {
      jest.mocked(cron.validate).mockReturnValue(false);

      expect(() => scheduler.start()).toThrow(CronValidationError);
      expect(cron.schedule).not.toHaveBeenCalled();
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should warn when already running', () => {
      scheduler.start();
      scheduler.start();

      expect(cron.schedule).toHaveBeenCalledTimes(1);
      expect(mockLogger.warn).toHaveBeenCalledWith('CronScheduler is already running');
    });

    it('should default the timezone to UTC', () => {
      new CronScheduler({ cronExpression: '0 2 * * *' }, mockBackupManager, mockLogger).start();

      expect(cron.schedule).toHaveBeenCalledWith('0 2 * * *', expect.any(Function), {
        scheduled: false,
        timezone: 'UTC',
      });
    });

    it('should run once right away when runOnInit is set', async () => {
      new CronScheduler({ ...config, runOnInit: true }, mockBackupManager, mockLogger).start();

      await new Promise(resolve => setImmediate(resolve));

      expect(mockBackupManager.backupAll).toHaveBeenCalledTimes(1);
    });

    it('should run backup then cleanup when the task fires', async () => {
      scheduler.start();
      const onTick = jest.mocked(cron.schedule).mock.calls[0][1];
      if (typeof onTick !== 'function') {
        throw new Error('expected a tick callback');
      }

      await onTick(new Date());

      expect(mockBackupManager.backupAll).toHaveBeenCalledTimes(1);
      expect(mockBackupManager.cleanup).toHaveBeenCalledTimes(1);
    });
  });

  describe('stop', () => {
    it('should stop a running task', () => {
      scheduler.start();
      scheduler.stop();

      expect(mockTask.stop).toHaveBeenCalled();
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should warn when not running', () => {
      scheduler.stop();

      expect(mockLogger.warn).toHaveBeenCalledWith('CronScheduler is not running');
    });
  });

  describe('executeScheduledRun', () => {
    it('should back up every database and then apply retention', async () => {
      const order: string[] = [];
      mockBackupManager.backupAll.mockImplementation(async () => {
        order.push('backup');
        return runResult;
      });
      mockBackupManager.cleanup.mockImplementation(async () => {
        order.push('cleanup');
        return retentionResult;
      });

      await scheduler.executeScheduledRun();

      expect(order).toEqual(['backup', 'cleanup']);
      expect(mockLogger.logScheduledExecution).toHaveBeenCalledWith('0 2 * * *');
      expect(mockLogger.info).toHaveBeenCalledWith(
        expect.stringMatching(/^\[cron-[0-9a-f-]+\] Scheduled run completed in \d+ms$/),
        { timestamp: '2024-01-15T02-00-00', databases: ['x'], deletedCount: 1 }
      );
    });

    it('should skip a run while the previous one is still going', async () => {
      let finish: (value: BackupRunResult) => void = () => undefined;
      mockBackupManager.backupAll.mockReturnValueOnce(
        new Promise(resolve => {
          finish = resolve;
        })
      );

      const first = scheduler.executeScheduledRun();
      await scheduler.executeScheduledRun();
      finish(runResult);
      await first;

      expect(mockBackupManager.backupAll).toHaveBeenCalledTimes(1);
      expect(mockLogger.warn).toHaveBeenCalledWith('Backup is already running, skipping this scheduled execution');
    });

    it('should log failures without throwing and skip cleanup', async () => {
      const error = new Error('S3 unavailable');
      mockBackupManager.backupAll.mockRejectedValue(error);

      await expect(scheduler.executeScheduledRun()).resolves.toBeUndefined();

      expect(mockBackupManager.cleanup).not.toHaveBeenCalled();
      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.stringContaining('Scheduled run failed'),
        error,
        { cronExpression: '0 2 * * *', timezone: 'UTC' }
      );
    });

    it('should allow the next run after a failure', async () => {
      mockBackupManager.backupAll.mockRejectedValueOnce(new Error('S3 unavailable'));

      await scheduler.executeScheduledRun();
      await scheduler.executeScheduledRun();

      expect(mockBackupManager.backupAll).toHaveBeenCalledTimes(2);
      expect(mockBackupManager.cleanup).toHaveBeenCalledTimes(1);
    });
  });

  describe('validateCronExpression', () => {
    it('should delegate to node-cron', () => {
      jest.mocked(cron.validate).mockReturnValue(false);

      expect(scheduler.validateCronExpression('bad')).toBe(false);
      expect(cron.validate).toHaveBeenCalledWith('bad');
    });
  });
});
