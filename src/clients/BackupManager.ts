import { WriteStream, createReadStream, createWriteStream } from 'fs';
import { mkdir, stat, unlink } from 'fs/promises';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BackupCatalog, BackupObject } from '../interfaces/BackupCatalog';
import { BackupConfig } from '../interfaces/BackupConfig';
import {
  BackupManager as IBackupManager,
  BackupRunResult,
  CloneResult,
  DatabaseBackupResult,
} from '../interfaces/BackupManager';
import { BackupResolver } from '../interfaces/BackupResolver';
import { DatabaseEngine } from '../interfaces/DatabaseEngine';
import { Logger } from '../interfaces/Logger';
import { RetentionManager, RetentionResult } from '../interfaces/RetentionManager';
import { S3Client } from '../interfaces/S3Client';
import { DownloadResult, TransferManager } from '../interfaces/TransferManager';
import {
  buildArtifactKey,
  buildDumpFileName,
  formatBackupTimestamp,
  localFilename,
  stagingNameFromFilename,
} from '../utils/BackupNaming';
import { formatError, getErrorString, toError } from '../utils/errorUtils';
import { EngineFailureError } from '../engines/ProcessRunner';
import { TransferFailedError } from './TransferManager';

export interface BackupManagerDependencies {
  engine: DatabaseEngine;
  s3Client: S3Client;
  catalog: BackupCatalog;
  resolver: BackupResolver;
  transfer: TransferManager;
  retention: RetentionManager;
  logger: Logger;

  /** Source of the shared run timestamp */
  clock?: () => Date;
}

/**
 * BackupManager composes catalog, resolver, transfer, retention and the
 * database engine into the user-facing operations.
 *
 * backupAll and cleanup both read the catalog and then act on it, so they are
 * queued behind each other on one manager instance.
 */
export class BackupManager implements IBackupManager {
  private engine: DatabaseEngine;
  private s3Client: S3Client;
  private catalog: BackupCatalog;
  private resolver: BackupResolver;
  private transfer: TransferManager;
  private retention: RetentionManager;
  private logger: Logger;
  private clock: () => Date;
  private config: BackupConfig;
  private queue: Promise<void> = Promise.resolve();

  constructor(dependencies: BackupManagerDependencies, config: BackupConfig) {
    this.engine = dependencies.engine;
    this.s3Client = dependencies.s3Client;
    this.catalog = dependencies.catalog;
    this.resolver = dependencies.resolver;
    this.transfer = dependencies.transfer;
    this.retention = dependencies.retention;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());
    this.config = config;
  }

  async backupAll(): Promise<BackupRunResult> {
    return this.withEnvironmentLock(async () => {
      const startTime = Date.now();
      const operationId = this.generateOperationId();
      const timestamp = formatBackupTimestamp(this.clock());

      this.logger.info(`[${operationId}] Starting backup of ${this.config.databases.length} database(s)`, {
        environment: this.config.environment,
        timestamp,
      });

      await mkdir(this.config.tempDir, { recursive: true });
      await this.s3Client.ensureBucket();

      const backups: DatabaseBackupResult[] = [];
      for (const database of this.config.databases) {
        backups.push(await this.backupDatabase(database, timestamp, operationId));
      }

      const duration = Date.now() - startTime;
      this.logger.info(`[${operationId}] Backup run completed successfully in ${duration}ms`);

      return { timestamp, backups, duration };
    });
  }

  async list(database: string, print: boolean = false): Promise<BackupObject[]> {
    return this.catalog.list(database, print);
  }

  async download(token: string): Promise<DownloadResult> {
    const resolved = await this.resolver.resolve(token);
    return this.transfer.download(resolved.object, resolved.database);
  }

  async restore(token: string): Promise<DownloadResult> {
    const downloaded = await this.download(token);

    this.logger.warn(`Restoring ${localFilename(downloaded.key)} over database ${downloaded.database}`);
    await this.engine.restoreDatabase(downloaded.database, createReadStream(downloaded.filePath));
    this.logger.info(`Restore completed: ${downloaded.database}`);

    return downloaded;
  }

  async clone(database: string): Promise<CloneResult> {
    const source = await this.resolver.resolveMostRecent(database);
    const downloaded = await this.download(source);
    const targetDatabase = stagingNameFromFilename(localFilename(downloaded.key));

    this.logger.info(`Cloning ${localFilename(downloaded.key)} into ${targetDatabase}`, { source });
    await this.engine.cloneDatabase(targetDatabase, createReadStream(downloaded.filePath));
    this.logger.info(`Clone completed: ${targetDatabase}`);

    return { source, targetDatabase, filePath: downloaded.filePath };
  }

  async cleanup(): Promise<RetentionResult> {
    return this.withEnvironmentLock(() => this.retention.cleanup());
  }

  /**
   * Checks connectivity to the object store and the database engine
   */
  async validateConfiguration(): Promise<boolean> {
    this.logger.info('Testing S3 connection...');
    if (!(await this.s3Client.testConnection())) {
      this.logger.warn('S3 connection test failed');
      return false;
    }

    this.logger.info(`Testing ${this.engine.name} connection...`);
    if (!(await this.engine.testConnection())) {
      this.logger.warn(`${this.engine.name} connection test failed`);
      return false;
    }

    this.logger.info('Configuration validation completed successfully');
    return true;
  }

  private async backupDatabase(database: string, timestamp: string, operationId: string): Promise<DatabaseBackupResult> {
    const startTime = Date.now();
    const fileName = buildDumpFileName(database, timestamp);
    const tempFilePath = join(this.config.tempDir, fileName);
    const s3Key = buildArtifactKey(this.config.environment, database, timestamp);

    this.logger.logBackupStart(database, { operationId, s3Key });

    try {
      const output = createWriteStream(tempFilePath);
      try {
        await this.engine.dumpDatabase(database, output);
      } catch (error) {
        await this.closeStream(output);
        throw this.asTransferFailure(error, s3Key, `Failed to write dump of ${database} to ${tempFilePath}`);
      }

      const { size } = await stat(tempFilePath);

      let s3Location: string;
      try {
        s3Location = await this.s3Client.uploadFile(tempFilePath, s3Key);
      } catch (error) {
        throw this.asTransferFailure(error, s3Key, `Failed to upload ${fileName}`);
      }

      const duration = Date.now() - startTime;
      this.logger.logBackupComplete(s3Key, size, s3Location, duration);
      this.logger.info(`successful backup: ${fileName}`);

      return { databaseName: database, fileName, fileSize: size, s3Key, s3Location, duration };
    } catch (error) {
      this.logger.logBackupError('backup_database', toError(error) ?? new Error(String(error)), {
        operationId,
        databaseName: database,
      });
      throw error;
    } finally {
      await this.cleanupTempFile(tempFilePath, operationId);
    }
  }

  /**
   * Engine failures keep their type; anything else on the way to the store is
   * a transfer failure
   */
  private asTransferFailure(error: unknown, key: string, message: string): Error {
    if (error instanceof EngineFailureError) {
      return error;
    }
    return new TransferFailedError(`${message}: ${formatError(error)}`, key, toError(error));
  }

  private closeStream(stream: WriteStream): Promise<void> {
    if (stream.closed) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      stream.once('close', () => resolve());
      stream.destroy();
    });
  }

  private async cleanupTempFile(filePath: string, operationId: string): Promise<void> {
    try {
      await unlink(filePath);
      this.logger.debug(`[${operationId}] Cleaned up temporary file: ${filePath}`);
    } catch (error) {
      if (getErrorString(error, 'code') !== 'ENOENT') {
        this.logger.warn(`[${operationId}] Failed to cleanup temporary file ${filePath}: ${formatError(error)}`);
      }
    }
  }

  private withEnvironmentLock<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    // The queue only tracks completion; callers still see the rejection
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private generateOperationId(): string {
    return `backup-${uuidv4()}`;
  }
}
