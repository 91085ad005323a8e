import { BackupObject } from './BackupCatalog';
import { DownloadResult } from './TransferManager';
import { RetentionResult } from './RetentionManager';

/**
 * Result of uploading one database dump
 */
export interface DatabaseBackupResult {
  /** Name of the database that was backed up */
  databaseName: string;

  /** Name of the local dump file */
  fileName: string;

  /** Size of the dump in bytes */
  fileSize: number;

  /** S3 key the dump was stored under */
  s3Key: string;

  /** S3 location where the backup was stored */
  s3Location: string;

  /** Duration of the dump and upload in milliseconds */
  duration: number;
}

/**
 * Result of a backup-all run
 */
export interface BackupRunResult {
  /** Timestamp component shared by every key of the run */
  timestamp: string;

  backups: DatabaseBackupResult[];

  /** Duration of the whole run in milliseconds */
  duration: number;
}

export interface CloneResult {
  /** Token of the backup that was cloned */
  source: string;

  /** Database the dump was loaded into */
  targetDatabase: string;

  filePath: string;
}

/**
 * Interface for the main backup orchestration manager
 */
export interface BackupManager {
  /** Dump every tracked database and upload it under one shared timestamp */
  backupAll(): Promise<BackupRunResult>;

  list(database: string, print?: boolean): Promise<BackupObject[]>;

  /** Download the backup named by an `index:database` token */
  download(token: string): Promise<DownloadResult>;

  /** Download and apply a backup over the database it was taken from */
  restore(token: string): Promise<DownloadResult>;

  /** Load the newest backup of a database into its staging name */
  clone(database: string): Promise<CloneResult>;

  /** Apply the keep-count retention policy */
  cleanup(): Promise<RetentionResult>;

  /** Validate the current configuration */
  validateConfiguration(): Promise<boolean>;
}
