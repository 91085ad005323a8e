export interface BackupConfig {
  /** Logical deployment name used as the key prefix, e.g. prod_br */
  environment: string;

  /** Databases tracked by backup-all runs and `all` listings */
  databases: string[];

  /** Backups kept per tracked database by the retention policy */
  keep: number;

  /** Name of the database engine adapter (postgresql, mysql) */
  engine: string;

  s3Url?: string;
  s3Bucket: string;
  s3Region: string;
  s3AccessKey: string;
  s3SecretKey: string;

  dbUser: string;
  dbPassword?: string;
  dbHost?: string;
  dbPort?: number;

  /** Where dumps are staged before upload */
  tempDir: string;

  /** Where downloads land (defaults to the working directory) */
  downloadDir: string;

  backupInterval?: string; // cron format, only needed by `schedule`
  logLevel?: string;
}
