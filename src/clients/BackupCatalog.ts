import { ALL_DATABASES, BackupCatalog as IBackupCatalog, BackupObject } from '../interfaces/BackupCatalog';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { S3Client } from '../interfaces/S3Client';
import { compareBackupObjects, databasePrefix, localFilename } from '../utils/BackupNaming';

/** Sink for human-readable listing lines */
export type OutputWriter = (line: string) => void;

/**
 * Lists the remote backups of an environment.
 *
 * Indices printed for a single-database listing are the index space
 * `index:database` tokens refer to. Positions in an `all` listing differ and
 * cannot be resolved.
 */
export class BackupCatalog implements IBackupCatalog {
  private s3Client: S3Client;
  private environment: string;
  private databases: string[];
  private logger: Logger;
  private output: OutputWriter;

  constructor(
    s3Client: S3Client,
    config: Pick<BackupConfig, 'environment' | 'databases'>,
    logger: Logger,
    output: OutputWriter = line => console.log(line)
  ) {
    this.s3Client = s3Client;
    this.environment = config.environment;
    this.databases = config.databases;
    this.logger = logger;
    this.output = output;
  }

  async list(database: string = ALL_DATABASES, print: boolean = false): Promise<BackupObject[]> {
    if (print) {
      this.output(`Listing database backups for ${database}`);
    }

    let backups: BackupObject[];
    if (database === ALL_DATABASES) {
      backups = [];
      for (const db of this.databases) {
        backups.push(...(await this.listDatabase(db)));
      }
      backups.sort(compareBackupObjects);
    } else {
      backups = await this.listDatabase(database);
    }

    this.logger.debug('Listed backups', {
      environment: this.environment,
      database,
      count: backups.length,
    });

    if (print) {
      this.output(`${backups.length} backup(s) found`);
      backups.forEach((backup, index) => {
        this.output(`${index}:${database} ${localFilename(backup.key)}`);
      });
    }

    return backups;
  }

  private async listDatabase(database: string): Promise<BackupObject[]> {
    const objects = await this.s3Client.listObjects(databasePrefix(this.environment, database));
    return [...objects].sort(compareBackupObjects);
  }
}
