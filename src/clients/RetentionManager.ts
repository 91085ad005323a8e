import { ALL_DATABASES, BackupCatalog, BackupObject } from '../interfaces/BackupCatalog';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import {
  RetentionManager as IRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { S3Client } from '../interfaces/S3Client';
import { OperationError } from '../utils/OperationError';
import { formatError } from '../utils/errorUtils';
import { StoreInconsistencyError } from './S3Client';

export class RetentionError extends OperationError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'RetentionError';
  }
}

/**
 * Keep-count retention over the merged listing of every tracked database.
 *
 * The newest `keep * databases.length` backups survive whatever database they
 * belong to, so a database backed up far more often than the others can push
 * their backups out of the window.
 */
export class RetentionManager implements IRetentionManager {
  private catalog: BackupCatalog;
  private s3Client: S3Client;
  private keep: number;
  private databaseCount: number;
  private logger: Logger;

  constructor(
    catalog: BackupCatalog,
    s3Client: S3Client,
    config: Pick<BackupConfig, 'keep' | 'databases'>,
    logger: Logger
  ) {
    if (!Number.isInteger(config.keep) || config.keep < 1) {
      throw new RetentionError(`keep must be a positive integer (got ${config.keep})`, 'configure');
    }

    this.catalog = catalog;
    this.s3Client = s3Client;
    this.keep = config.keep;
    this.databaseCount = config.databases.length;
    this.logger = logger;
  }

  get keepCount(): number {
    return this.keep * this.databaseCount;
  }

  selectExpiredBackups(backups: BackupObject[]): BackupObject[] {
    const eligible = backups.length - this.keepCount;
    return eligible > 0 ? backups.slice(0, eligible) : [];
  }

  async cleanup(): Promise<RetentionResult> {
    const backups = await this.catalog.list(ALL_DATABASES);
    const expired = this.selectExpiredBackups(backups);

    const result: RetentionResult = {
      totalCount: backups.length,
      keepCount: this.keepCount,
      deletedCount: 0,
      deletedKeys: [],
      skippedKeys: [],
    };

    this.logger.info(
      `Retention cleanup: ${backups.length} backup(s) found, keeping newest ${this.keepCount}`,
      { expiredCount: expired.length }
    );

    for (const backup of expired) {
      this.logger.info(`deleting: ${backup.key}`, {
        lastModified: backup.lastModified.toISOString(),
      });

      try {
        await this.s3Client.deleteObject(backup.key);
      } catch (error) {
        if (!(error instanceof StoreInconsistencyError)) {
          throw error;
        }
        // Listed but already gone: an eventually-consistent store catching up
        this.logger.warn(`Backup already removed from store: ${backup.key}`, {
          reason: formatError(error),
        });
        result.skippedKeys.push(backup.key);
      }

      result.deletedCount++;
      result.deletedKeys.push(backup.key);
    }

    this.logger.logRetentionCleanup(result.deletedCount, result.keepCount);
    return result;
  }
}
